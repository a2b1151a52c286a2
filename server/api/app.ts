import type { NextFunction, Request, Response } from "express";
import express from "express";
import finalhandler from "finalhandler";
import type { AppConfig, Environment } from "../lib/config";
import createCachedMatrix from "../lib/holder";
import { CACHE_HIT_MESSAGE, InverseResolver } from "../lib/inverse";
import logger, { loggingMiddlewares } from "../lib/logger";
import { dimensions } from "../lib/matrix";
import api from "./api";

function unexpectedErrorHandler() {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    return function (err: unknown, req: Request, res: Response, _next: NextFunction) {
        logger.error("Error occurred: ", { err });
        finalhandler(req, res)(err);
    };
}

export default function createApp(config: AppConfig, environment: Environment) {
    const holder = createCachedMatrix(config.initialMatrix);
    const resolver = new InverseResolver();
    resolver.on("cacheHit", () => logger.info(CACHE_HIT_MESSAGE));

    const [rows, columns] = dimensions(config.initialMatrix);
    logger.debug(`Serving a ${ rows }x${ columns } matrix as ${ environment }`);

    const app = express();
    app.enable("strict routing");
    app.disable("x-powered-by");

    app.use(loggingMiddlewares());

    app.get("/status", (_req: Request, res: Response) => {
        res.send("Matrix inverse API (TypeScript) is running.");
    });

    app.use("/api", api(config, holder, resolver));

    app.use(unexpectedErrorHandler());

    return app;
}
