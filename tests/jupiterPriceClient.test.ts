import { MockAgent } from 'undici';

import { PriceUnavailableError } from '../src/domain/errors.js';
import { JupiterPriceClient, buildPriceQuery } from '../src/pricing/jupiterPriceClient.js';

import { T0, silentLogger } from './support/fixtures.js';

const ORIGIN = 'https://price.test';

describe('JupiterPriceClient', () => {
  let agent: MockAgent;
  let requestedPaths: string[];

  const pricePath = (path: string): boolean => path.startsWith('/price/v3');

  const respond =
    (statusCode: number, data: string | object) =>
    (request: { path: string }) => {
      requestedPaths.push(request.path);
      return { statusCode, data };
    };

  const client = () =>
    new JupiterPriceClient({
      baseUrl: ORIGIN,
      logger: silentLogger(),
      rateLimitRps: 1000,
      retryCount: 2,
      dispatcher: agent,
      now: () => T0
    });

  beforeEach(() => {
    requestedPaths = [];
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('builds a deduplicated id query', () => {
    expect(buildPriceQuery(['mint-a', 'mint-b', 'mint-a'])).toBe('ids=mint-a%2Cmint-b');
  });

  it('returns the usd price of one asset', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: pricePath, method: 'GET' })
      .reply(respond(200, { 'mint-a': { usdPrice: 1.25, priceChange24h: 3.2 } }));

    await expect(client().getPrice('mint-a')).resolves.toEqual({ price: 1.25, asOf: T0 });
    expect(requestedPaths).toEqual(['/price/v3?ids=mint-a']);
  });

  it('returns null when the asset is not priced', async () => {
    agent.get(ORIGIN).intercept({ path: pricePath, method: 'GET' }).reply(respond(200, { 'mint-a': null }));

    await expect(client().getPrice('mint-a')).resolves.toBeNull();
  });

  it('retries server errors', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: pricePath, method: 'GET' }).reply(respond(503, 'unavailable'));
    pool.intercept({ path: pricePath, method: 'GET' }).reply(respond(200, { 'mint-a': { usdPrice: 2 } }));

    await expect(client().getPrice('mint-a')).resolves.toEqual({ price: 2, asOf: T0 });
    expect(requestedPaths).toHaveLength(2);
  });

  it('gives up on client errors without retrying', async () => {
    agent.get(ORIGIN).intercept({ path: pricePath, method: 'GET' }).reply(respond(400, 'bad ids'));

    const quote = client().getPrice('mint-a');

    await expect(quote).rejects.toBeInstanceOf(PriceUnavailableError);
    await expect(quote).rejects.toThrow('Price unavailable for mint-a: bad ids');
    expect(requestedPaths).toHaveLength(1);
  });

  it('quotes several assets in one request and skips unusable prices', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: pricePath, method: 'GET' })
      .reply(
        respond(200, {
          'mint-a': { usdPrice: 1 },
          'mint-b': { usdPrice: 0 },
          'mint-c': null
        })
      );

    const quotes = await client().getPrices(['mint-a', 'mint-b', 'mint-c', 'mint-d']);

    expect([...quotes.entries()]).toEqual([['mint-a', { price: 1, asOf: T0 }]]);
    expect(requestedPaths).toEqual(['/price/v3?ids=mint-a%2Cmint-b%2Cmint-c%2Cmint-d']);
  });
});
