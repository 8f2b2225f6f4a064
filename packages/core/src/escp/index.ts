export { ByteWriter } from "./byteWriter.js";
export { renderDocument, renderPage, type PageSource } from "./renderer.js";
export { EscpStyleState } from "./state.js";
