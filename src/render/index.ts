export { Projection } from "./Projection";
export { createTesseract } from "./Tesseract";
export { WireframeRenderer, mixColor } from "./WireframeRenderer";
export type { IGraphics } from "./WireframeRenderer";
