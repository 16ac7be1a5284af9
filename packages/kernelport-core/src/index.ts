// kernelport core - CUDA kernel to WGSL translation
export * from "./parser/index.js";
export * from "./analysis/index.js";
export * from "./codegen/index.js";
export * from "./diagnostics/index.js";
export * from "./visualize/index.js";
export { translate, parseOnly } from "./pipeline.js";
export type { TranslateResult } from "./pipeline.js";
