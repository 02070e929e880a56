import { createHash } from "node:crypto";
import { Writable } from "node:stream";
import type { ContentDigest } from "@deploy-guard/core-domain";

const CR = 0x0d;
const LF = 0x0a;

/**
 * MD5 keeps digests comparable with snapshot files written by earlier
 * releases of the tool.  It is an equality check, not a security boundary.
 */
const ALGORITHM = "md5";

function toBytes(chunk: Uint8Array | string): Uint8Array {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
}

export function stripLineBreaks(chunk: Uint8Array): Uint8Array {
  if (chunk.indexOf(CR) === -1 && chunk.indexOf(LF) === -1) return chunk;
  return chunk.filter((b) => b !== CR && b !== LF);
}

/**
 * Incremental fingerprint.  CR and LF are single bytes, so stripping them
 * per chunk gives the same digest however the input is split.
 */
export class FingerprintAccumulator {
  private readonly hash = createHash(ALGORITHM);
  private rawSize = 0;
  private result: ContentDigest | null = null;

  update(chunk: Uint8Array | string): this {
    if (this.result) throw new Error("FingerprintAccumulator already finalized");
    const bytes = toBytes(chunk);
    this.rawSize += bytes.length;
    this.hash.update(stripLineBreaks(bytes));
    return this;
  }

  digest(): ContentDigest {
    if (!this.result) {
      this.result = { fingerprint: this.hash.digest("hex"), rawSize: this.rawSize };
    }
    return this.result;
  }
}

export function fingerprintBytes(content: Uint8Array | string): ContentDigest {
  return new FingerprintAccumulator().update(content).digest();
}

export async function fingerprintStream(
  source: AsyncIterable<Uint8Array | string>
): Promise<ContentDigest> {
  const acc = new FingerprintAccumulator();
  for await (const chunk of source) acc.update(chunk);
  return acc.digest();
}

/** Writable end of the fingerprinter, for transfers that push into a sink. */
export class FingerprintSink extends Writable {
  private readonly acc = new FingerprintAccumulator();

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.acc.update(chunk);
    callback();
  }

  digest(): ContentDigest {
    return this.acc.digest();
  }
}
