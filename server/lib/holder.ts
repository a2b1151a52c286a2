import _ from "lodash";
import type { Matrix } from "./matrix";

/**
 * Owns a matrix and, once somebody stores it, the inverse of that matrix.
 *
 * The holder never computes anything. Replacing the matrix always drops the
 * stored inverse, so a present inverse belongs to the current matrix. Both
 * values are copied on the way in and out; callers cannot change them in place.
 */
export class CachedMatrixHolder {
    private matrix: Matrix;
    private cachedInverse: Matrix | undefined = undefined;

    constructor(matrix: Matrix) {
        this.matrix = _.cloneDeep(matrix);
    }

    public replaceMatrix(matrix: Matrix): void {
        this.matrix = _.cloneDeep(matrix);
        this.cachedInverse = undefined;
    }

    public getMatrix(): Matrix {
        return _.cloneDeep(this.matrix);
    }

    public storeInverse(inverse: Matrix): void {
        this.cachedInverse = _.cloneDeep(inverse);
    }

    public getCachedInverse(): Matrix | undefined {
        return this.cachedInverse && _.cloneDeep(this.cachedInverse);
    }

    public hasCachedInverse(): boolean {
        return this.cachedInverse !== undefined;
    }
}

export default function createCachedMatrix(initial: Matrix): CachedMatrixHolder {
    return new CachedMatrixHolder(initial);
}
