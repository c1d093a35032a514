import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { LocalObjectStore, md5 } from "../src/infrastructure/services/local-object-store.service.js";
import type { UploadedPart } from "../src/core/domain/services/object-store.service.js";
import { makeTmpDir, patternedBuffer, rmTmpDir, writeTree } from "./helpers/tmp.js";

describe("LocalObjectStore", () => {
  let dir: string;
  let store: LocalObjectStore;

  beforeEach(() => {
    dir = makeTmpDir("local");
    store = new LocalObjectStore(dir);
  });

  afterEach(() => rmTmpDir(dir));

  it("writes nested keys and reads them back", async () => {
    await store.put("a/b/c.txt", Buffer.from("nested"), 6);
    expect(readFileSync(join(dir, "a", "b", "c.txt"), "utf-8")).toBe("nested");
    expect((await store.get("a/b/c.txt")).toString()).toBe("nested");
    expect(readdirSync(join(dir, "a", "b"))).toEqual(["c.txt"]);
  });

  it("reads byte ranges", async () => {
    writeTree(dir, { "r.bin": "0123456789" });
    expect((await store.readRange("r.bin", 3, 4)).toString()).toBe("3456");
    await expect(store.readRange("r.bin", 8, 4)).rejects.toThrow(/Short read/);
  });

  it("stats files with a content hash", async () => {
    writeTree(dir, { "s.txt": "hello" });
    expect(await store.stat("s.txt")).toMatchObject({
      key: "s.txt",
      size: 5,
      contentHash: md5(Buffer.from("hello")),
      origin: "local",
    });
    expect(await store.stat("missing.txt")).toBeNull();
  });

  it("refuses keys that escape the root", async () => {
    await expect(store.put("../outside.txt", Buffer.from("x"), 1)).rejects.toThrow(
      /resolves outside/,
    );
  });

  it("assembles multipart uploads in part order", async () => {
    const body = patternedBuffer(3000);
    const session = await store.initiateMultipart("mp/out.bin");
    const parts = [
      { index: 3, body: body.subarray(2000) },
      { index: 1, body: body.subarray(0, 1000) },
      { index: 2, body: body.subarray(1000, 2000) },
    ];
    const uploaded: UploadedPart[] = [];
    for (const p of parts) {
      uploaded.push({ index: p.index, etag: await store.uploadPart(session, p.index, p.body) });
    }
    await store.completeMultipart(session, uploaded);
    expect(readFileSync(join(dir, "mp", "out.bin")).equals(body)).toBe(true);
    expect(readdirSync(join(dir, "mp"))).toEqual(["out.bin"]);
  });

  it("rejects a part whose ETag does not match", async () => {
    const session = await store.initiateMultipart("bad.bin");
    await store.uploadPart(session, 1, Buffer.from("abc"));
    await expect(
      store.completeMultipart(session, [{ index: 1, etag: "0".repeat(32) }]),
    ).rejects.toThrow(/does not match its ETag/);
    await store.abortMultipart(session);
    expect(existsSync(join(dir, "bad.bin"))).toBe(false);
    expect(readdirSync(dir)).toEqual([]);
  });

  it("forgets an aborted session", async () => {
    const session = await store.initiateMultipart("gone.bin");
    await store.abortMultipart(session);
    await expect(store.uploadPart(session, 1, Buffer.from("x"))).rejects.toThrow(/Unknown upload/);
  });

  it("deletes idempotently", async () => {
    writeTree(dir, { "d.txt": "bye" });
    await store.delete("d.txt");
    await store.delete("d.txt");
    expect(existsSync(join(dir, "d.txt"))).toBe(false);
  });
});
