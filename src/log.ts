import pino from "pino";
import { isTestEnv, readEnv } from "./util/env.js";

export function createLogger() {
    const level = isTestEnv() ? "silent" : (readEnv("LOG_LEVEL") ?? "info");
    const pretty = !isTestEnv() && readEnv("LOG_PRETTY") !== "false";
    const transport = pretty ? pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: true,
            ignore: "pid,hostname",
        },
    }) : undefined;
    return pino({
        base: undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    }, transport);
}

export const log = createLogger();

export function withScope(scope: string) {
    return log.child({ scope });
}

export default log;
