export * from "./ContentComparator";
export * from "./ContentComparatorMd5";
