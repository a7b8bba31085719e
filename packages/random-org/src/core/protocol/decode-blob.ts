import type { BlobFormat } from "../../ports/methods"

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/
const HEX = /^(?:[0-9a-fA-F]{2})*$/

/** Returns undefined when `encoded` is not valid in `format`. */
export function decodeBlob(encoded: string, format: BlobFormat): Uint8Array | undefined {
  if (format === "hex") {
    return HEX.test(encoded) ? new Uint8Array(Buffer.from(encoded, "hex")) : undefined
  }

  if (encoded.length % 4 !== 0 || !BASE64.test(encoded)) return undefined
  return new Uint8Array(Buffer.from(encoded, "base64"))
}
