/**
 * @dotgrid/core
 *
 * Runtime-agnostic TypeScript core for dotgrid: compose a widget tree onto a
 * fixed 160×51 character page and serialize documents to ESC/P bytes.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Geometry, wire constants, programmer errors
// =============================================================================

export {
  PAGE_WIDTH,
  PAGE_HEIGHT,
  U16_MAX,
  ESC,
  ESC_RESET,
  SI_CONDENSED,
  ESC_BOLD_ON,
  ESC_BOLD_OFF,
  ESC_UNDERLINE_ON,
  ESC_UNDERLINE_OFF,
  CR,
  LF,
  FF,
  REPLACEMENT_CHAR,
  DotgridError,
  type DotgridErrorCode,
} from "./abi.js";

// =============================================================================
// Layout errors and primitives
// =============================================================================

export {
  formatLayoutError,
  type LayoutResult,
  type LayoutError,
  type LayoutErrorCode,
  type RegionError,
  type CompositionError,
  type ContentError,
  type RenderError,
  type InvalidDimensionsError,
  type RegionOutOfBoundsError,
  type InvalidSplitError,
  type ChildExceedsParentError,
  type OverlappingChildrenError,
  type InsufficientSpaceError,
  type IntegerOverflowError,
  type InvalidCoordinateError,
  type TextExceedsWidthError,
  type OutOfBoundsError,
} from "./layout/errors.js";
export { ORIGIN, boundsOverlap, type Bounds, type Position, type Size } from "./layout/types.js";

// =============================================================================
// Cells, pages, regions, documents
// =============================================================================

export {
  STYLE_NONE,
  STYLE_BOLD,
  STYLE_UNDERLINE,
  EMPTY_CELL,
  cellChar,
  cellEquals,
  createCell,
  isBold,
  isUnderline,
  normalizeCodePoint,
  styleFlags,
  withBold,
  withUnderline,
  type Cell,
  type StyleFlags,
} from "./grid/cell.js";
export { Page, PageBuilder } from "./grid/page.js";
export { Region, type HorizontalSplit, type VerticalSplit } from "./grid/region.js";
export { Document, DocumentBuilder } from "./document/document.js";

// =============================================================================
// Widget tree and layout allocators
// =============================================================================

export type { PositionedChild, Widget } from "./widget/types.js";
export { Container } from "./widget/container.js";
export { Label, utf8ByteLength } from "./widget/label.js";
export { ContentBox } from "./widget/contentBox.js";
export { RenderContext } from "./widget/context.js";
export { Column, Row, Stack, type Allocation } from "./widget/layout/index.js";

// =============================================================================
// Content widgets
// =============================================================================

export {
  AsciiBox,
  KeyValueList,
  Paragraph,
  Table,
  TextBlock,
  TextLabel,
  clipToWidth,
  wrapText,
  type AsciiBoxOptions,
  type ColumnDef,
  type ContentWidget,
  type KeyValueEntry,
  type KeyValueListOptions,
} from "./content/index.js";

// =============================================================================
// Serializer and previews
// =============================================================================

export { ByteWriter, EscpStyleState, renderDocument, renderPage, type PageSource } from "./escp/index.js";
export { pageToLines, pageToText, type PagePreviewOptions } from "./testing/preview.js";
