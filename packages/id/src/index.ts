export { sequence } from "./adapters/sequence"
export { uuidV4, uuidV7 } from "./adapters/uuid"
export type { IdGenerator } from "./ports/id-generator"
