export * from "./graph";
export * from "./maze";
export * from "./path";
export * from "./solver";
