const HEX_32 = /^[0-9a-f]{32}$/i;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const HEX_16 = /^[0-9a-f]{16}$/i;

/** Event and trace ids: 32 hex digits, optionally in dashed UUID form. */
export function isEventId(value: unknown): boolean {
  return typeof value === "string" && (HEX_32.test(value) || UUID.test(value));
}

export function isSpanId(value: unknown): boolean {
  return typeof value === "string" && HEX_16.test(value);
}
