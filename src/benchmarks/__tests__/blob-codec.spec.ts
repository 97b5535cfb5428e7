import { BlobDecodeError } from "../benchmarks.errors";
import { BlobEncoding } from "../benchmarks.types";
import { decodeBinaryBlob, encodeBinaryBlob } from "../blob-codec";

describe("blob codec", () => {
  describe("decodeBinaryBlob", () => {
    it("should decode hex items in order, accepting mixed case", () => {
      const decoded = decodeBinaryBlob({ encoding: BlobEncoding.Hex, data: ["aAbB", "ccdd", ""] });

      expect(decoded).toEqual([Buffer.from([0xaa, 0xbb]), Buffer.from([0xcc, 0xdd]), Buffer.alloc(0)]);
    });

    it("should decode base64 items", () => {
      const decoded = decodeBinaryBlob({ encoding: BlobEncoding.Base64, data: ["AQID", "/w=="] });

      expect(decoded).toEqual([Buffer.from([1, 2, 3]), Buffer.from([0xff])]);
    });

    it("should return an empty list for empty data", () => {
      expect(decodeBinaryBlob({ encoding: BlobEncoding.Hex, data: [] })).toEqual([]);
    });

    it("should report the index of the first malformed item", () => {
      const decode = () => decodeBinaryBlob({ encoding: BlobEncoding.Hex, data: ["aa", "zz", "q"] });

      expect(decode).toThrow(BlobDecodeError);
      expect(decode).toThrow("Malformed hex data at binary item 1");
      try {
        decode();
      } catch (error) {
        expect(error).toBeInstanceOf(BlobDecodeError);
        if (error instanceof BlobDecodeError) {
          expect(error.index).toBe(1);
          expect(error.encoding).toBe(BlobEncoding.Hex);
        }
      }
    });

    it("should reject odd-length hex", () => {
      expect(() => decodeBinaryBlob({ encoding: BlobEncoding.Hex, data: ["abc"] })).toThrow(
        "Malformed hex data at binary item 0"
      );
    });

    it.each(["QR==", "AQI", "AQ=ID", "A Q I D"])("should reject non-canonical base64 %p", datum => {
      expect(() => decodeBinaryBlob({ encoding: BlobEncoding.Base64, data: [datum] })).toThrow(BlobDecodeError);
    });
  });

  describe("encodeBinaryBlob", () => {
    const updateData = [Buffer.from([0xde, 0xad]), Buffer.from([0xbe, 0xef, 0x01])];

    it("should encode as lowercase hex", () => {
      expect(encodeBinaryBlob(updateData, BlobEncoding.Hex)).toEqual({
        encoding: BlobEncoding.Hex,
        data: ["dead", "beef01"],
      });
    });

    it("should encode as padded base64", () => {
      expect(encodeBinaryBlob(updateData, BlobEncoding.Base64)).toEqual({
        encoding: BlobEncoding.Base64,
        data: ["3q0=", "vu8B"],
      });
    });

    it("should decode what it encodes", () => {
      for (const encoding of [BlobEncoding.Hex, BlobEncoding.Base64]) {
        expect(decodeBinaryBlob(encodeBinaryBlob(updateData, encoding))).toEqual(updateData);
      }
    });
  });
});
