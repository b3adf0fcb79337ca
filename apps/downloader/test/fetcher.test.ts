import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import {
  BlockCipher,
  DecryptError,
  IOError,
  NetworkError,
} from "@tsgrab/streaming";
import { fetchSegment } from "../src/download/fetcher";
import type { CryptoContext } from "../src/download/key-resolver";
import {
  LocalSegmentStorage,
  createTempOutputDir,
  removeOutputDir,
  segmentFilePath,
} from "../src/io/storage";
import {
  FailingStorage,
  FakeHttpClient,
  TEST_IV,
  TEST_KEY,
  createSequence,
  createStreamServer,
  plaintextFor,
  segmentUri,
} from "./helpers";

describe("fetchSegment", () => {
  let outputDir: string;
  const storage = new LocalSegmentStorage();

  beforeEach(async () => {
    outputDir = await createTempOutputDir();
  });

  afterEach(async () => {
    await removeOutputDir(outputDir);
  });

  const contextFor = (iv: Buffer): CryptoContext => ({
    cipher: new BlockCipher(TEST_KEY),
    iv,
    keyUri: "unused",
  });

  it("should decrypt and write the segment, returning an open handle", async () => {
    const http = createStreamServer(1, { iv: TEST_IV });
    const [segment] = createSequence(1, { iv: TEST_IV });
    const destination = segmentFilePath(outputDir, 0);

    const file = await fetchSegment(segment, contextFor(TEST_IV), destination, { http, storage });
    try {
      const { size } = await file.stat();
      expect(size).toBe(plaintextFor(0).length);
    } finally {
      await file.close();
    }

    expect(await readFile(destination)).toEqual(plaintextFor(0));
  });

  it("should only use the first block of a longer IV", async () => {
    const http = createStreamServer(1, { iv: TEST_IV });
    const [segment] = createSequence(1);
    const longIv = Buffer.concat([TEST_IV, Buffer.from("trailing bytes")]);
    const destination = segmentFilePath(outputDir, 0);

    const file = await fetchSegment(segment, contextFor(longIv), destination, { http, storage });
    await file.close();

    expect(await readFile(destination)).toEqual(plaintextFor(0));
  });

  it("should raise DecryptError when the body is not whole blocks", async () => {
    const http = new FakeHttpClient(new Map([[segmentUri(0), Buffer.alloc(20)]]));
    const [segment] = createSequence(1);

    await expect(
      fetchSegment(segment, contextFor(TEST_KEY), segmentFilePath(outputDir, 0), { http, storage })
    ).rejects.toBeInstanceOf(DecryptError);
  });

  it("should pass NetworkError through untouched", async () => {
    const http = new FakeHttpClient(new Map());
    const [segment] = createSequence(1);

    await expect(
      fetchSegment(segment, contextFor(TEST_KEY), segmentFilePath(outputDir, 0), { http, storage })
    ).rejects.toBeInstanceOf(NetworkError);
  });

  it("should raise IOError when the file cannot be written", async () => {
    const http = createStreamServer(1);
    const [segment] = createSequence(1);

    await expect(
      fetchSegment(segment, contextFor(TEST_KEY), segmentFilePath(outputDir, 0), {
        http,
        storage: new FailingStorage(),
      })
    ).rejects.toBeInstanceOf(IOError);
  });

  it("should raise IOError from local storage for a missing directory", async () => {
    const http = createStreamServer(1);
    const [segment] = createSequence(1);
    const destination = segmentFilePath(`${outputDir}/missing/nested`, 0);

    await expect(
      fetchSegment(segment, contextFor(TEST_KEY), destination, { http, storage })
    ).rejects.toBeInstanceOf(IOError);
  });
});
