import { InvalidPriceIdentifierError, PriceIdentifier } from "../price-identifier";

const HEX_ID = "e62df6c8b4a85fe1a67db44dc12de5db330f7ac66b72dc658afedf0f4a415b43";

describe("PriceIdentifier", () => {
  it("should normalise to lowercase hex without prefix", () => {
    const id = PriceIdentifier.fromHex(`0x${HEX_ID.toUpperCase()}`);
    expect(id.toHex()).toBe(HEX_ID);
    expect(id.toString()).toBe(HEX_ID);
    expect(JSON.stringify({ id })).toBe(`{"id":"${HEX_ID}"}`);
  });

  it("should give equal canonical forms for prefixed and bare input", () => {
    expect(PriceIdentifier.fromHex(`0x${HEX_ID}`).toHex()).toBe(PriceIdentifier.fromHex(HEX_ID).toHex());
  });

  it.each(["", "abc", HEX_ID.slice(2), `${HEX_ID}00`, `zz${HEX_ID.slice(2)}`])("should reject %p", input => {
    expect(() => PriceIdentifier.fromHex(input)).toThrow(InvalidPriceIdentifierError);
  });

  it("should report the rejected input", () => {
    expect(() => PriceIdentifier.fromHex("abc")).toThrow('Invalid price identifier "abc": expected 64 hex digits');
  });
});
