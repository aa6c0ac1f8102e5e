export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export type {
  FlightKey,
  FlightResult,
  FlightSource,
  Singleflight,
} from "./ports/single-flight"
