export * from "./catalog/catalog-loader.js";
export * from "./recommend/config.js";
export * from "./recommend/constraint-layer.js";
export * from "./recommend/content-layer.js";
export * from "./recommend/engine.js";
export * from "./recommend/factor-aggregator.js";
export * from "./recommend/manifest.js";
export * from "./recommend/platform.js";
export * from "./recommend/ranking-layer.js";
export * from "./recommend/resolution-cascade.js";
export * from "./recommend/space-adjustment.js";
export * from "./recommend/types.js";
