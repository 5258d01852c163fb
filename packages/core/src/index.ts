export * from "./artifacts";
export * from "./extractors";
