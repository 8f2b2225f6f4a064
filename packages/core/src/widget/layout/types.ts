import type { Position } from "../../layout/types.js";
import type { Container } from "../container.js";

/** A freshly sized container and the position to add it at in the parent. */
export type Allocation = Readonly<{ container: Container; position: Position }>;
