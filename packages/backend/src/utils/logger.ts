import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: appConfig.APP_NAME,
  level: appConfig.LOG_LEVEL
});
