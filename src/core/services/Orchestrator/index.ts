export { decide } from "./Dispatcher";
export type { Completion, Decision } from "./Dispatcher";
export { drain } from "./Aggregator";
