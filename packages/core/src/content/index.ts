export { AsciiBox, type AsciiBoxOptions } from "./asciiBox.js";
export { KeyValueList, type KeyValueEntry, type KeyValueListOptions } from "./keyValueList.js";
export { Paragraph, wrapText } from "./paragraph.js";
export { Table, type ColumnDef } from "./table.js";
export { TextBlock } from "./textBlock.js";
export { TextLabel } from "./textLabel.js";
export { type ContentWidget, clipToWidth } from "./types.js";
