export * from "./delta";
export * from "./snapshot";
export * from "./synchronizer";
