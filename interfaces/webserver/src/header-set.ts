import { z } from "@coi-serve/utils";

/**
 * A single response header, name first.
 */
export type HeaderEntry = readonly [name: string, value: string];

// RFC 9110 token characters
const headerNameSchema = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, "Invalid header name");

const headerValueSchema = z
  .string()
  .refine(
    (value) => !/[\r\n\0]/.test(value),
    "Header value contains CR, LF or NUL",
  );

export const headerEntriesSchema = z
  .array(z.tuple([headerNameSchema, headerValueSchema]))
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    for (const [name] of entries) {
      const key = name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate header: ${name}`,
        });
      }
      seen.add(key);
    }
  });

/**
 * Headers that put a page in a cross-origin isolated context
 * (SharedArrayBuffer, Atomics.wait, threaded WebAssembly), allow any origin
 * to fetch from the dev server, and keep browsers from caching stale builds.
 */
export const CROSS_ORIGIN_ISOLATION_HEADERS = [
  ["Cross-Origin-Opener-Policy", "same-origin"],
  ["Cross-Origin-Embedder-Policy", "require-corp"],
  ["Access-Control-Allow-Origin", "*"],
  ["Access-Control-Allow-Methods", "GET, POST, OPTIONS"],
  ["Access-Control-Allow-Headers", "*"],
  ["Cache-Control", "no-store, no-cache, must-revalidate"],
] as const satisfies readonly HeaderEntry[];

/**
 * Ordered, immutable set of response headers written onto every response.
 *
 * Built once at startup and handed to the gateway; never mutated afterwards.
 */
export class HeaderSet implements Iterable<HeaderEntry> {
  private readonly entries: readonly HeaderEntry[];

  private constructor(entries: readonly HeaderEntry[]) {
    this.entries = Object.freeze(
      entries.map(([name, value]) => Object.freeze([name, value] as const)),
    );
  }

  /**
   * Build a header set from name/value pairs, keeping their order.
   * Throws a ZodError on malformed names or values and on duplicate names
   * (compared case-insensitively).
   */
  public static from(entries: Iterable<readonly [string, string]>): HeaderSet {
    return new HeaderSet(headerEntriesSchema.parse(Array.from(entries)));
  }

  /**
   * The header set the dev server ships with.
   */
  public static crossOriginIsolation(): HeaderSet {
    return HeaderSet.from(CROSS_ORIGIN_ISOLATION_HEADERS);
  }

  public get size(): number {
    return this.entries.length;
  }

  /**
   * Case-insensitive lookup.
   */
  public get(name: string): string | undefined {
    const key = name.toLowerCase();
    const entry = this.entries.find(
      ([entryName]) => entryName.toLowerCase() === key,
    );
    return entry?.[1];
  }

  public [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries[Symbol.iterator]();
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}
