import fs from "node:fs/promises"
import path from "node:path"

import { describeConfigSourceContract, sampleValues } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  seed: async (dir) => {
    const lines = Object.entries(sampleValues).map(([key, value]) => `${key}=${value}`)
    await fs.writeFile(path.join(dir, ".env.test"), `${lines.join("\n")}\n`)
  },
  create: (dir) => new DotenvSource({ file: ".env.test", required: true, cwd: dir }),
  expected: sampleValues,
})
