export * from "./find";
export * from "./details";
export * from "./book";
export * from "./search";
export * from "./venue";
