export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export { type AppConfig, type EnvConfig, envSchema } from "./schema"
