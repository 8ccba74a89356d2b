export { treblle, type TreblleMiddleware, type TreblleOptions } from './middleware.js'
export { HonoExtractor, type HonoExchange, type ResponseSnapshot } from './extractor.js'
