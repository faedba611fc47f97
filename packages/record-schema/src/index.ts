export * from "./format";
export * from "./schema";
export * from "./template";
export * from "./load";
