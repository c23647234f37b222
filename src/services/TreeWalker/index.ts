export * from "./TreeWalker";
export * from "./TreeWalkerDefault";
