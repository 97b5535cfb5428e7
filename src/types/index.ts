export * from "./price-feed.types";
export * from "./price-identifier";
