export type { IRenderer, RenderOptions } from "./renderer.interface.js";
export { GotenbergRenderer } from "./gotenberg-renderer.js";
export type { GotenbergRendererConfig } from "./gotenberg-renderer.js";
export { isPdf } from "./pdf.js";
export { getSupportedType, getSupportedTypeByExtension, normalizeMime } from "./supported-types.js";
export type { SupportedType } from "./supported-types.js";
