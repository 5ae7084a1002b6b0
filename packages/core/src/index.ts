export * from "./types";
export * from "./classifyMessage";
export * from "./chunkText";
export * from "./messages";
