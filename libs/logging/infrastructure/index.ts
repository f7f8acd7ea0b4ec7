export { WinstonLogBackend, WARNINGS_LOGGER } from "./winston/winston.log-backend";
