export * from "./schemas/engine-config";
export * from "./schemas/filters";
export * from "./schemas/market";
export * from "./schemas/onchain";
export * from "./schemas/trade-candidate";
export * from "./schemas/trail";
