// noinspection JSUnusedGlobalSymbols

declare namespace jest {
    // eslint-disable-next-line @typescript-eslint/no-empty-object-type
    interface Matchers<R, T = {}> {
        toBeMatrixCloseTo(expected: number[][], digits?: number): R;
        toBeInverseOf(matrix: number[][], digits?: number): R;
    }
}
