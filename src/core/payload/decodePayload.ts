import { gunzipSync } from "zlib";
import { DecodeExhaustedError } from "../errors";

export type PayloadEncoding = "utf-8" | "cp932" | "latin1";

export type DecodedPayload = {
  encoding: PayloadEncoding;
  compressed: boolean;
  text: string;
};

export type DecodeResult =
  | { ok: true; payload: DecodedPayload }
  | { ok: false; error: DecodeExhaustedError };

export type DecodeOptions = {
  /** When false, bytes that are neither UTF-8 nor Shift-JIS yield DecodeExhaustedError instead of Latin-1 text. */
  allowLatin1?: boolean;
};

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export const hasGzipMagic = (bytes: Uint8Array): boolean =>
  bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];

const tryGunzip = (bytes: Uint8Array): Buffer | undefined => {
  if (!hasGzipMagic(bytes)) return undefined;
  try {
    return gunzipSync(bytes);
  } catch {
    // Magic bytes without a valid stream: treat the body as uncompressed.
    return undefined;
  }
};

const tryStrictDecode = (label: "utf-8" | "shift_jis", bytes: Uint8Array): string | undefined => {
  try {
    return new TextDecoder(label, { fatal: true, ignoreBOM: false }).decode(bytes);
  } catch {
    return undefined;
  }
};

const decoded = (encoding: PayloadEncoding, compressed: boolean, text: string): DecodeResult => ({
  ok: true,
  payload: { encoding, compressed, text }
});

/**
 * Recovers report text from a downloaded document whose compression and charset are not declared.
 *
 * Ladder, first success wins:
 * 1. gunzip, then strict UTF-8
 * 2. raw bytes as strict UTF-8
 * 3. Shift-JIS (WHATWG `shift_jis`, i.e. the Windows-31J table, reported as `cp932`)
 * 4. Latin-1, which accepts any byte sequence
 */
export const decodePayload = (bytes: Uint8Array, options: DecodeOptions = {}): DecodeResult => {
  const { allowLatin1 = true } = options;
  const inflated = tryGunzip(bytes);

  if (inflated) {
    const text = tryStrictDecode("utf-8", inflated);
    if (text != null) return decoded("utf-8", true, text);
  }

  const rawUtf8 = tryStrictDecode("utf-8", bytes);
  if (rawUtf8 != null) return decoded("utf-8", false, rawUtf8);

  const body = inflated ?? bytes;
  const compressed = inflated != null;

  const sjis = tryStrictDecode("shift_jis", body);
  if (sjis != null) return decoded("cp932", compressed, sjis);

  if (allowLatin1) {
    return decoded("latin1", compressed, Buffer.from(body).toString("latin1"));
  }

  return {
    ok: false,
    error: new DecodeExhaustedError({
      message: `Unable to decode ${body.length} bytes as UTF-8 or Shift-JIS`,
      byteLength: body.length
    })
  };
};
