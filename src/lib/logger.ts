import pino from "pino";
import { v4 as uuid } from "uuid";
import { getEnv } from "../env";

function createLogger(): pino.Logger {
  const env = getEnv();

  // stdout is the dashboard; logs go to a file
  if (env.NODE_ENV === "test") {
    return pino({ level: "silent" });
  }

  return pino(
    { level: env.LOG_LEVEL, base: { sessionId: uuid() } },
    pino.destination({ dest: env.LOG_FILE, mkdir: true, sync: true })
  );
}

export const logger = createLogger();
