import type { Response } from "express";
import { getCorrelationId } from "./logger";
import type { Resolution } from "./inverse";

function getResponseCorrelationId(status: number) {
    let correlationId: string | undefined;
    if (status >= 400) {
        correlationId = getCorrelationId();
    }
    return correlationId ? { correlation: { id: correlationId } } : undefined;
}

export function sendResolutionResponse(res: Response, resolution: Resolution) {
    const cached = resolution.source === "cache";
    res.set("X-Cache", cached ? "HIT" : "MISS");
    res.json({ inverse: resolution.inverse, cached });
}

export function sendErrorResponse(res: Response, status: number, message: string,
    details?: Record<string, string>) {
    res.status(status).json({ ...getResponseCorrelationId(status), message, ...details });
}
