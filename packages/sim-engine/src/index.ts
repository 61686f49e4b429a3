export * from "./brokers/IBroker";
export { SimBroker, type SimBrokerOptions } from "./brokers/SimBroker";
export * from "./strategy/DefaultStrategy";
export * from "./observers";
export * from "./analyzers";
export { DrawdownTracker } from "./drawdown";
export { SimEngine, type SimEngineOptions } from "./SimEngine";
export { SummaryRenderer, RENDER_MODES, type SummaryRendererOptions } from "./render/SummaryRenderer";
