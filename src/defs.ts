export * from "./types/symbols";
export * from "./types/meta";
export * from "./types/utilities";
export * from "./types/poll";
export * from "./types/error";
export * from "./types/inheritableLocal";
