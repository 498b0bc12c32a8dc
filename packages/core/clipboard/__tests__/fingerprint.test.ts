import { EMPTY_FINGERPRINT, UNSET_FINGERPRINT, fingerprint } from "../fingerprint";
import { filterBundle } from "../filter";
import type { DataBundle } from "../../models/DataBundle";

function b(entries: Array<[string, string]>): DataBundle {
  return new Map(entries.map(([mime, text]): [string, Uint8Array] => [mime, new TextEncoder().encode(text)]));
}

describe("fingerprint", () => {
  test("empty bundle and empty intersection give the well-known value", () => {
    expect(fingerprint(new Map(), [])).toBe(EMPTY_FINGERPRINT);
    expect(fingerprint(new Map(), ["text/plain"])).toBe(EMPTY_FINGERPRINT);
    expect(fingerprint(b([["image/png", "x"]]), ["text/plain"])).toBe(EMPTY_FINGERPRINT);
    expect(EMPTY_FINGERPRINT).not.toBe(UNSET_FINGERPRINT);
  });

  test("ignores types outside the tracked set", () => {
    const a = b([["text/plain", "hello"], ["image/png", "aaa"]]);
    const c = b([["image/png", "bbb"], ["text/plain", "hello"]]);
    expect(fingerprint(a, ["text/plain"])).toBe(fingerprint(c, ["text/plain"]));
    expect(fingerprint(a, [])).not.toBe(fingerprint(c, []));
  });

  test("does not depend on insertion order", () => {
    const a = b([["text/plain", "x"], ["text/html", "<p>x</p>"]]);
    const c = b([["text/html", "<p>x</p>"], ["text/plain", "x"]]);
    expect(fingerprint(a, [])).toBe(fingerprint(c, []));
    expect(fingerprint(a, ["text/plain", "text/html"])).toBe(fingerprint(a, ["text/html", "text/plain"]));
  });

  test("tracked fingerprint equals the fingerprint of the filtered bundle", () => {
    const data = b([["text/plain", "hello"], ["image/png", "\u0000\u0001"], ["text/html", "<b>hi</b>"]]);
    const tracked = ["text/plain", "text/html", "text/uri-list"];
    expect(fingerprint(data, tracked)).toBe(fingerprint(filterBundle(data, tracked), []));
  });

  test("distinguishes payloads, type names and boundaries", () => {
    expect(fingerprint(b([["text/plain", "a"]]), [])).not.toBe(fingerprint(b([["text/plain", "b"]]), []));
    expect(fingerprint(b([["text/plain", "a"]]), [])).not.toBe(fingerprint(b([["text/html", "a"]]), []));
    expect(fingerprint(b([["a", "bc"], ["b", ""]]), [])).not.toBe(fingerprint(b([["a", "b"], ["b", "c"]]), []));
  });

  test("present-but-empty payload differs from an absent type", () => {
    expect(fingerprint(b([["text/plain", ""]]), [])).not.toBe(EMPTY_FINGERPRINT);
  });

  test("returns an unsigned 32-bit integer", () => {
    const value = fingerprint(b([["text/plain", "some longer clipboard text"]]), []);
    expect(Number.isInteger(value)).toBe(true);
    expect(value).toBeGreaterThan(0);
    expect(value).toBeLessThanOrEqual(0xffffffff);
  });
});
