export * from "./photo";
