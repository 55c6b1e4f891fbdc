export * from "./constants";
export * from "./schemas/testSuite";
export * from "./schemas/outcomes";
export { testSuiteSample } from "./schemas/samples/testSuite.sample";
