export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export { type AppConfig, loadAppConfig } from "./app/config"
export { defaultCatalog } from "./domains/quotes/catalog"
export { QuoteError } from "./domains/quotes/quote.errors"
export { SimulatedQuoteService } from "./domains/quotes/simulated-quote-service"
export { run } from "./run"
