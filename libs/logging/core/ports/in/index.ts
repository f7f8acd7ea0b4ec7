export * from "./log-configuration.use-case";
