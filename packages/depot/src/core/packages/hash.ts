import { createHash } from "node:crypto"

/** Hex digest of a byte string. */
export type HashFunction = (bytes: Uint8Array) => string

export const sha256: HashFunction = (bytes) => createHash("sha256").update(bytes).digest("hex")
