export * from "./IStrategy";
export * from "./BaseStrategy";
export * from "./IEngine";
export * from "./IRenderer";
export * from "./ISample";
