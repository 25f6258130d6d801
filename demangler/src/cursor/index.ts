export { Cursor, isDigit } from "./cursor.ts";
export * from "./discriminators.ts";
export { SubstitutionTable } from "./substitutions.ts";
