export * from "./defaults";
export * from "./timeouts";
