import _ from "lodash";

export type Matrix = number[][];

export function isMatrix(value: unknown): value is Matrix {
    if (!Array.isArray(value) || value.length === 0) {
        return false;
    }
    const first: unknown = value[0];
    const columns = Array.isArray(first) ? first.length : 0;
    return columns > 0 && value.every((row: unknown) =>
        Array.isArray(row)
        && row.length === columns
        && row.every((item: unknown) => _.isNumber(item) && Number.isFinite(item)));
}

export function dimensions(matrix: Matrix): [rows: number, columns: number] {
    return [matrix.length, matrix[0]?.length ?? 0];
}

export function isSquare(matrix: Matrix): boolean {
    return matrix.length > 0 && matrix.every((row) => row.length === matrix.length);
}

/**
 * Maximum absolute column sum.
 */
export function oneNorm(matrix: Matrix): number {
    const [, columns] = dimensions(matrix);
    return _.max(_.range(columns).map((column) => _.sumBy(matrix, (row) => Math.abs(row[column])))) ?? 0;
}

export function formatMatrix(matrix: Matrix, digits = 7): string {
    const cells = matrix.map((row) => row.map((value) => String(Number(value.toPrecision(digits)))));
    const width = _.max(cells.flat().map((cell) => cell.length)) ?? 0;
    return cells.map((row) => row.map((cell) => cell.padStart(width)).join(" ")).join("\n");
}
