import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "crypto";
import winston, { type LoggerOptions } from "winston";
import type { NextFunction, Request, RequestHandler, Response } from "express";

type RequestContext = { correlationId: string };

const requestContext = new AsyncLocalStorage<RequestContext>();

export function getCorrelationId(): string | undefined {
    return requestContext.getStore()?.correlationId;
}

const errorFormat = winston.format((info) => {
    const err = info.err ?? info.error;
    if (err instanceof Error) {
        info.errMessage = err.stack ?? `${ err.name }: ${ err.message }`;
        if (err.cause !== undefined) {
            info.errCause = err.cause instanceof Error ? `${ err.cause.name }: ${ err.cause.message }` : String(err.cause);
        }
    } else if (err !== null && err !== undefined) {
        info.errMessage = String(err);
    }
    return info;
});

const correlationIdFormat = winston.format((info) => {
    const correlationId = getCorrelationId();
    if (correlationId) {
        info.correlationId = correlationId;
    }
    return info;
});

const upperCaseLevelFormat = winston.format((info) => {
    info.level = info.level.toUpperCase();
    return info;
});

const outputFormat = winston.format.printf((info) => {
    const text = `[${ info.level }]${ info.correlationId ? `[${ info.correlationId }]` : "" } ` +
        `${ info.timestamp ? `${ info.timestamp } ` : "" }` +
        `${ info.message }` +
        `${ info.errMessage ? `\n${ info.errMessage }` : "" }` +
        `${ info.errCause ? `\nCaused by: ${ info.errCause }` : "" }`;
    // continuation lines are indented under the first one
    return text.split("\n").map((line, index) => index === 0 ? line : `    ${ line }`).join("\n");
});

function correlationIdMiddleware(): RequestHandler {
    return (_req: Request, _res: Response, next: NextFunction) => {
        requestContext.run({ correlationId: crypto.randomBytes(8).toString("hex") }, next);
    };
}

function accessLogMiddleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const client = req.ip ?? req.socket.remoteAddress ?? "unknown";
        const request = `${ req.method } ${ req.originalUrl } from ${ client }`;
        logger.debug(request);

        res.once("finish", () => {
            const status = `${ res.statusCode } ${ res.statusMessage }`;
            const level = res.statusCode < 400 ? "info" : res.statusCode < 500 ? "warn" : "error";
            const cache = res.getHeader("X-Cache");
            logger.log(level, `${ request } - ${ colorize.colorize(level, status) }${ cache ? ` (cache ${ cache })` : "" }`);
        });
        next();
    };
}

export function loggingMiddlewares(): RequestHandler[] {
    return [
        correlationIdMiddleware(),
        accessLogMiddleware(),
    ];
}

function defaultLevel(): string {
    switch (process.env.NODE_ENV) {
        case "production":
            return "info";
        case "test":
            return "warn";
        default:
            return "debug";
    }
}

export const colorize = winston.format.colorize({ level: true });

const loggerOpts: LoggerOptions = {
    level: process.env.LOG_LEVEL || defaultLevel(),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                correlationIdFormat(),
                errorFormat(),
                upperCaseLevelFormat(),
                winston.format.timestamp(),
                winston.format.splat(),
                colorize,
                outputFormat
            )
        })
    ]
};

const logger = winston.createLogger(loggerOpts);

export default logger;
