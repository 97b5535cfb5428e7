import { BlobDecodeError } from "./benchmarks.errors";
import { BlobEncoding, type BinaryBlob } from "./benchmarks.types";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const BUFFER_ENCODINGS: Record<BlobEncoding, BufferEncoding> = {
  [BlobEncoding.Base64]: "base64",
  [BlobEncoding.Hex]: "hex",
};

function decodeHex(datum: string): Buffer | undefined {
  return HEX_PATTERN.test(datum) ? Buffer.from(datum, "hex") : undefined;
}

function decodeBase64(datum: string): Buffer | undefined {
  if (!BASE64_PATTERN.test(datum)) return undefined;

  const bytes = Buffer.from(datum, "base64");
  // Reject non-zero padding bits: only the canonical encoding is accepted
  return bytes.toString("base64") === datum ? bytes : undefined;
}

function decodeDatum(datum: string, encoding: BlobEncoding): Buffer | undefined {
  switch (encoding) {
    case BlobEncoding.Base64:
      return decodeBase64(datum);
    case BlobEncoding.Hex:
      return decodeHex(datum);
    default: {
      const unsupported: never = encoding;
      throw new Error(`Unsupported blob encoding: ${String(unsupported)}`);
    }
  }
}

/**
 * Decodes every item of the blob, in order. Throws BlobDecodeError on the
 * first malformed item; no partial result is returned.
 */
export function decodeBinaryBlob(blob: BinaryBlob): Buffer[] {
  return blob.data.map((datum, index) => {
    const bytes = decodeDatum(datum, blob.encoding);
    if (!bytes) {
      throw new BlobDecodeError(index, blob.encoding);
    }
    return bytes;
  });
}

/**
 * Encodes raw update messages for transport. Hex output is lowercase.
 */
export function encodeBinaryBlob(updateData: readonly Buffer[], encoding: BlobEncoding): BinaryBlob {
  return {
    encoding,
    data: updateData.map(bytes => bytes.toString(BUFFER_ENCODINGS[encoding])),
  };
}
