export type PriceQuote = {
  price: number;
  /** Epoch ms at which the quote was observed. */
  asOf: number;
};

/** Returns the latest USD quote for an asset, or null when none is known. */
export interface PriceOracle {
  getPrice(assetId: string): Promise<PriceQuote | null>;
}

/** Fixed quotes, for tests and offline runs. */
export class StaticPriceOracle implements PriceOracle {
  private readonly quotes = new Map<string, PriceQuote>();

  constructor(private readonly now: () => number = Date.now) {}

  set(assetId: string, price: number, asOf = this.now()): void {
    this.quotes.set(assetId, { price, asOf });
  }

  delete(assetId: string): void {
    this.quotes.delete(assetId);
  }

  async getPrice(assetId: string): Promise<PriceQuote | null> {
    const quote = this.quotes.get(assetId);
    return quote ? { ...quote } : null;
  }
}
