/**
 * Oids of the types this library knows how to read and write
 *
 * https://github.com/postgres/postgres/blob/master/src/include/catalog/pg_type.dat
 */
export const Oid = {
  text: 25,
  float8: 701,
  circle: 718,
  date: 1082,
  timestamp: 1114,
  timestamptz: 1184,
  interval: 1186,
} as const;

export type OidType = keyof typeof Oid;
export type OidValue = (typeof Oid)[OidType];

export const OidTypes = {
  25: "text",
  701: "float8",
  718: "circle",
  1082: "date",
  1114: "timestamp",
  1184: "timestamptz",
  1186: "interval",
} as const satisfies Record<OidValue, OidType>;

export function isOidValue(oid: number): oid is OidValue {
  return oid in OidTypes;
}
