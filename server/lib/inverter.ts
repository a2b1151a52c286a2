import { inv } from "mathjs";
import { NotInvertibleError } from "./errors";
import { dimensions, isSquare, type Matrix, oneNorm } from "./matrix";

export type InversionOptions = {
    /**
     * Smallest acceptable reciprocal condition number (1-norm), `Number.EPSILON`
     * when omitted. Zero rejects only an exactly singular matrix.
     */
    tolerance?: number,
};

export type Inverter = (matrix: Matrix, options: InversionOptions) => Matrix;

export function reciprocalCondition(matrix: Matrix, inverse: Matrix): number {
    return 1 / (oneNorm(matrix) * oneNorm(inverse));
}

export function invertMatrix(matrix: Matrix, options: InversionOptions = {}): Matrix {
    if (!isSquare(matrix)) {
        const [rows, columns] = dimensions(matrix);
        throw new NotInvertibleError("non-square", `Matrix must be square (size: ${ rows }x${ columns })`);
    }

    let inverse: Matrix;
    try {
        inverse = inv(matrix);
    } catch (err: unknown) {
        throw new NotInvertibleError("singular", "Matrix is singular", { cause: err });
    }

    const { tolerance = Number.EPSILON } = options;
    const rcond = reciprocalCondition(matrix, inverse);
    // NaN fails as well
    if (!(rcond >= tolerance)) {
        throw new NotInvertibleError("singular",
            `Matrix is computationally singular: reciprocal condition number = ${ rcond }`);
    }
    return inverse;
}
