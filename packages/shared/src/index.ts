export * from "./direction";
export * from "./cell";
export * from "./messages";
