export * from "./highlight/index.ts";
export * from "./renderer/index.ts";
