import pino from "pino";
import { config } from "../config";

const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: { service: "loan-amortization" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
