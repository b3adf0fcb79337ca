/**
 * @tsgrab/streaming
 * Types, errors and AES-CBC primitives for encrypted segment streams
 */

export * from "./crypto/aes";
export * from "./crypto/hash";
export * from "./constants";
export * from "./types";
export * from "./errors";
