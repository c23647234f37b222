export * from "./PlacementPolicy";
export * from "./PlacementPolicyDefault";
