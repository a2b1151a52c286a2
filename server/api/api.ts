import type { NextFunction, Request, Response } from "express";
import express from "express";
import _ from "lodash";
import type { AppConfig } from "../lib/config";
import { NotInvertibleError } from "../lib/errors";
import type { CachedMatrixHolder } from "../lib/holder";
import type { InverseResolver, Resolution } from "../lib/inverse";
import type { InversionOptions } from "../lib/inverter";
import logger from "../lib/logger";
import { dimensions, isMatrix } from "../lib/matrix";
import { sendErrorResponse, sendResolutionResponse } from "../lib/res";

function errorStatus(err: unknown): number | undefined {
    if (_.isObject(err) && "status" in err && _.isNumber(err.status)) {
        return err.status;
    }
    return undefined;
}

function unexpectedErrorHandler() {
    return function (err: unknown, _req: Request, res: Response, next: NextFunction) {
        if (res.headersSent) {
            next(err);
            return;
        }
        const status = errorStatus(err);
        if (status !== undefined && status >= 400 && status < 500) {
            logger.warn("Rejected API request:", { err });
            sendErrorResponse(res, status, status === 413 ? "Request body too large" : "Invalid request body");
            return;
        }
        logger.error("API error:", { err });
        sendErrorResponse(res, 500, "API error, see server logs for details");
    };
}

function unknownApiMiddleware() {
    return function (_req: Request, res: Response) {
        sendErrorResponse(res, 404, "Unknown API");
    };
}

/**
 * Tolerance from the query string merged over the configured options, or
 * `undefined` when the query value is not a non-negative number.
 */
function inversionOptions(query: unknown, defaults: InversionOptions): InversionOptions | undefined {
    if (query === undefined) {
        return defaults;
    }
    const tolerance = _.isString(query) && query.trim() !== "" ? Number(query) : NaN;
    if (!Number.isFinite(tolerance) || tolerance < 0) {
        return undefined;
    }
    return { ...defaults, tolerance };
}

export default function router(config: AppConfig, holder: CachedMatrixHolder, resolver: InverseResolver) {
    const router = express.Router({ strict: true });

    const v1 = express.Router({ strict: true });
    router.use("/v1", v1);

    v1.get("/status", (_req: Request, res: Response) => {
        const [rows, columns] = dimensions(holder.getMatrix());
        res.json({
            message: "Matrix inverse API is running",
            matrix: { rows, columns },
            inverseCached: holder.hasCachedInverse(),
        });
    });

    v1.get("/matrix", (_req: Request, res: Response) => {
        res.json({ matrix: holder.getMatrix() });
    });

    v1.put("/matrix", express.json({ limit: config.bodyLimit }), (req: Request, res: Response) => {
        const body: unknown = req.body;
        const matrix: unknown = _.isPlainObject(body) ? _.get(body, "matrix") : undefined;
        if (!isMatrix(matrix)) {
            sendErrorResponse(res, 400, "Body must be {\"matrix\": [[...], ...]} with rows of equal length");
            return;
        }
        holder.replaceMatrix(matrix);
        const [rows, columns] = dimensions(matrix);
        logger.info(`Matrix replaced with a ${ rows }x${ columns } matrix`);
        res.json({ message: "Matrix replaced", matrix: { rows, columns } });
    });

    v1.get("/matrix/inverse", (req: Request, res: Response) => {
        const options = inversionOptions(req.query.tolerance, config.inversion);
        if (!options) {
            sendErrorResponse(res, 400, "Tolerance must be a non-negative number");
            return;
        }

        let resolution: Resolution;
        try {
            resolution = resolver.lookup(holder, options);
        } catch (err: unknown) {
            if (err instanceof NotInvertibleError) {
                sendErrorResponse(res, 422, err.message, { reason: err.reason });
                return;
            }
            throw err;
        }
        sendResolutionResponse(res, resolution);
    });

    router.use(unknownApiMiddleware());
    router.use(unexpectedErrorHandler());

    return router;
}
