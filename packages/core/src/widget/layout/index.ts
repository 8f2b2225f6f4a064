export { Column } from "./column.js";
export { Row } from "./row.js";
export { Stack } from "./stack.js";
export type { Allocation } from "./types.js";
