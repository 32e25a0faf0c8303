export * from "./blob";
export * from "./compare";
export * from "./config";
export * from "./deal-finder";
export * from "./errors";
export * from "./listings";
export * from "./price";
export * from "./rank";
export * from "./report";
export * from "./specs";
export * from "./url";
export * from "./wishlist";
export type * from "./types";
