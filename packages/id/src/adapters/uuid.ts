import { randomUUID as v4 } from "node:crypto"
import { v7 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

/** Random ids; useful when several clients share one log stream. */
export const uuidV4: IdGenerator<string> = { generate: () => v4() }

/** Time-ordered ids, so request ids sort by dispatch time. */
export const uuidV7: IdGenerator<string> = { generate: () => v7() }
