// Capability interfaces for everything the engine talks to but does not own.

export interface PriceQuote {
  /** USD price at 8-decimal scale. May be zero or negative on a broken feed. */
  price: bigint;
  /** Unix seconds of the round the price was published in. */
  updatedAt: number;
}

export interface PriceFeed {
  readonly id: string;
  latestQuote(): PriceQuote;
}

/**
 * Fungible token contract as seen by the engine. `false` means the token
 * refused the movement; the engine treats it as TransferFailed.
 */
export interface FungibleToken {
  readonly id: string;
  balanceOf(account: string): bigint;
  transfer(sender: string, recipient: string, amount: bigint): boolean;
  transferFrom(payer: string, recipient: string, amount: bigint): boolean;
}

export type CollateralToken = FungibleToken;

export interface SyntheticToken extends FungibleToken {
  mint(to: string, amount: bigint): boolean;
  /** Destroys `amount` held by `holder`. Throws if the holder is short. */
  burn(holder: string, amount: bigint): void;
  totalSupply(): bigint;
}
