import { expect } from "@jest/globals";
import type { MatcherFunction } from "expect";
import _ from "lodash";
import { isMatrix, type Matrix } from "./server/lib/matrix";

function checkMatrix(value: unknown, what: string): Matrix {
    if (!isMatrix(value)) {
        throw new TypeError(`The ${ what } must be a numeric matrix!`);
    }
    return value;
}

function multiply(left: Matrix, right: Matrix): Matrix {
    return left.map((row) => right[0].map((_value, column) =>
        row.reduce((sum, value, k) => sum + value * right[k][column], 0)));
}

function identity(size: number): Matrix {
    return _.range(size).map((row) => _.range(size).map((column) => row === column ? 1 : 0));
}

// Infinity when the shapes differ
function maxDifference(left: Matrix, right: Matrix): number {
    if (left.length !== right.length || left.some((row, index) => row.length !== right[index].length)) {
        return Infinity;
    }
    return _.max(left.flatMap((row, i) => row.map((value, j) => Math.abs(value - right[i][j])))) ?? 0;
}

function isClose(difference: number, digits: number): boolean {
    return difference < Math.pow(10, -digits) / 2;
}

const toBeMatrixCloseTo: MatcherFunction<[expected: Matrix, digits?: number]> =
    function (actual: unknown, expected: Matrix, digits = 8) {
        const difference = maxDifference(checkMatrix(actual, "received value"), checkMatrix(expected, "expected value"));
        const pass = isClose(difference, digits);
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) }${ pass ? " not" : "" } to be close to ${
                    this.utils.printExpected(expected) } (${ digits } digits, largest difference ${ difference })`,
            pass,
        };
    };

const toBeInverseOf: MatcherFunction<[matrix: Matrix, digits?: number]> =
    function (actual: unknown, matrix: Matrix, digits = 8) {
        const inverse = checkMatrix(actual, "received value");
        const original = checkMatrix(matrix, "matrix");
        const difference = original[0].length === inverse.length ?
            maxDifference(multiply(original, inverse), identity(original.length)) :
            Infinity;
        const pass = isClose(difference, digits);
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) }${ pass ? " not" : "" } to be the inverse of ${
                    this.utils.printExpected(matrix) } (${ digits } digits, largest difference from identity ${
                    difference })`,
            pass,
        };
    };

expect.extend({
    toBeMatrixCloseTo,
    toBeInverseOf,
});
