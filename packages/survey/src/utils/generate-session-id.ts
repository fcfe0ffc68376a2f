import { randomUUID } from "node:crypto"
import type { SessionId } from "../types.js"

/**
 * Mint a fresh session identity (a UUID v4).
 */
export function generateSessionId(): SessionId {
  return randomUUID()
}
