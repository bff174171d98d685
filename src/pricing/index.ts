export { JupiterPriceClient, buildPriceQuery, type JupiterPriceClientOptions } from './jupiterPriceClient.js';
export { StaticPriceOracle, type PriceOracle, type PriceQuote } from './priceOracle.js';
