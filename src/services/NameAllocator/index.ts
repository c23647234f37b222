export * from "./NameAllocator";
export * from "./NameAllocatorDefault";
