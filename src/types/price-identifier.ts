const PRICE_IDENTIFIER_BYTES = 32;
const PRICE_IDENTIFIER_PATTERN = /^(?:0x)?[0-9a-fA-F]{64}$/;

export class InvalidPriceIdentifierError extends Error {
  constructor(readonly input: string) {
    super(`Invalid price identifier "${input}": expected ${PRICE_IDENTIFIER_BYTES * 2} hex digits`);
    this.name = "InvalidPriceIdentifierError";
  }
}

/**
 * Stable 32-byte key naming one price feed.
 * The canonical string form is lowercase hex without a 0x prefix.
 */
export class PriceIdentifier {
  private constructor(private readonly hex: string) {}

  static fromHex(input: string): PriceIdentifier {
    if (!PRICE_IDENTIFIER_PATTERN.test(input)) {
      throw new InvalidPriceIdentifierError(input);
    }
    const digits = input.startsWith("0x") ? input.slice(2) : input;
    return new PriceIdentifier(digits.toLowerCase());
  }

  toHex(): string {
    return this.hex;
  }

  toString(): string {
    return this.hex;
  }

  toJSON(): string {
    return this.hex;
  }
}
