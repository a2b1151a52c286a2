import { TypedEmitter } from "tiny-typed-emitter";
import type { CachedMatrixHolder } from "./holder";
import { type InversionOptions, type Inverter, invertMatrix } from "./inverter";
import logger from "./logger";
import { dimensions, formatMatrix, type Matrix } from "./matrix";

export const CACHE_HIT_MESSAGE = "getting cached data";

export type ResolutionSource = "cache" | "computed";

export type Resolution = {
    inverse: Matrix,
    source: ResolutionSource,
};

interface InverseResolverEvents {
    "cacheHit": (holder: CachedMatrixHolder, inverse: Matrix) => void,
    "cacheMiss": (holder: CachedMatrixHolder) => void,
}

/**
 * Returns the inverse of the matrix kept by a {@link CachedMatrixHolder}.
 *
 * The resolver keeps no state of its own. The first request for a holder calls
 * the inverter and stores its result into the holder; later requests return the
 * stored inverse and emit `cacheHit`, until the holder gets a new matrix.
 * Inverter failures reach the caller as thrown and leave the holder untouched.
 */
export class InverseResolver extends TypedEmitter<InverseResolverEvents> {
    constructor(private readonly invert: Inverter = invertMatrix) {
        super();
    }

    public resolve(holder: CachedMatrixHolder, options: InversionOptions = {}): Matrix {
        return this.lookup(holder, options).inverse;
    }

    public lookup(holder: CachedMatrixHolder, options: InversionOptions = {}): Resolution {
        const cached = holder.getCachedInverse();
        if (cached !== undefined) {
            this.emit("cacheHit", holder, cached);
            return { inverse: cached, source: "cache" };
        }

        this.emit("cacheMiss", holder);
        const matrix = holder.getMatrix();
        const [rows, columns] = dimensions(matrix);
        logger.debug(`Computing inverse of ${ rows }x${ columns } matrix`);

        const inverse = this.invert(matrix, options);
        holder.storeInverse(inverse);
        if (logger.isDebugEnabled()) {
            logger.debug(`Cached inverse:\n${ formatMatrix(inverse) }`);
        }
        return { inverse, source: "computed" };
    }
}

const resolver = new InverseResolver();
resolver.on("cacheHit", () => logger.info(CACHE_HIT_MESSAGE));

export function cacheSolve(holder: CachedMatrixHolder, options: InversionOptions = {}): Matrix {
    return resolver.resolve(holder, options);
}

export default resolver;
