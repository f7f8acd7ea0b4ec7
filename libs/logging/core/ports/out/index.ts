export { LogBackendPort } from "./log-backend.port";
