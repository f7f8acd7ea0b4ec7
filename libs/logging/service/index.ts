export { LogContextRegistry } from "./log-context.registry";
export { LogConfigurator } from "./log-configurator.service";
