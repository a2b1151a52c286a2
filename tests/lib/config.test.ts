import { jest } from "@jest/globals";
import osPath from "path";
import { createFiles, withTmpDir } from "../utils";

const env = { ...process.env };

beforeEach(() => {
    for (const key of ["HTTP_HOST", "HTTP_PORT", "BODY_SIZE_LIMIT", "INITIAL_MATRIX", "INITIAL_MATRIX_FILE",
        "INVERSION_TOLERANCE", "LOG_LEVEL"]) {
        delete process.env[key];
    }
});

afterEach(() => {
    process.env = { ...env };
    jest.resetModules();
});

describe("Test environment variables and config.ts", () => {
    test("Check test defaults", async () => {
        process.env.NODE_ENV = "test";

        const { default: config } = await import("../../server/lib/config");

        expect(config.environment).toEqual("test");
        expect(config.app.initialMatrix).toEqual([[1]]);
        expect(config.app.inversion.tolerance).toBe(Number.EPSILON);
        expect(config.app.bodyLimit).toEqual("100kb");
        expect(config.http.serverOptions.hosts).toEqual(["localhost"]);
        expect(config.http.serverOptions.ports).toEqual([3000]);
    });

    test("Check production defaults", async () => {
        process.env.NODE_ENV = "production";

        const { default: config } = await import("../../server/lib/config");

        expect(config.environment).toEqual("production");
        expect(config.http.serverOptions.hosts).toEqual([null]);
        expect(config.http.serverOptions.ports).toEqual([3000]);
    });

    test("Check that unknown environment is development", async () => {
        delete process.env.NODE_ENV;

        const { default: config } = await import("../../server/lib/config");

        expect(config.environment).toEqual("development");
        expect(config.http.serverOptions.hosts).toEqual(["localhost"]);
    });

    test("Check custom listen hosts, ports and body limit", async () => {
        process.env.HTTP_HOST = " 127.0.0.1, ::1 ,127.0.0.1,";
        process.env.HTTP_PORT = "8080, 8081";
        process.env.BODY_SIZE_LIMIT = "1mb";

        const { default: config } = await import("../../server/lib/config");

        expect(config.http.serverOptions.hosts).toEqual(["127.0.0.1", "::1"]);
        expect(config.http.serverOptions.ports).toEqual([8080, 8081]);
        expect(config.app.bodyLimit).toEqual("1mb");
    });

    test("Check that invalid port is rejected", async () => {
        process.env.HTTP_PORT = "80a";

        await expect(import("../../server/lib/config")).rejects.toThrow("Invalid HTTP_PORT value: 80a");
    });

    test("Check inline initial matrix", async () => {
        process.env.INITIAL_MATRIX = " [[1, 4, 6], [2, 1, 7], [3, 7, 8]] ";

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.initialMatrix).toEqual([[1, 4, 6], [2, 1, 7], [3, 7, 8]]);
    });

    test("Check that non-square initial matrix is accepted", async () => {
        process.env.INITIAL_MATRIX = "[[1, 2, 3]]";

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.initialMatrix).toEqual([[1, 2, 3]]);
    });

    test("Check that unparseable initial matrix is rejected", async () => {
        process.env.INITIAL_MATRIX = "[[1, 2";

        await expect(import("../../server/lib/config")).rejects.toThrow("Unable to parse INITIAL_MATRIX as JSON");
    });

    test("Check that ragged initial matrix is rejected", async () => {
        process.env.INITIAL_MATRIX = "[[1, 2], [3]]";

        await expect(import("../../server/lib/config")).rejects.toThrow(
            "INITIAL_MATRIX does not contain a rectangular matrix of finite numbers");
    });

    test("Check initial matrix file taking precedence", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "matrix.json": "[[4, 7], [2, 6]]",
        });
        process.env.INITIAL_MATRIX_FILE = osPath.join(dir, "matrix.json");
        process.env.INITIAL_MATRIX = "[[1]]";

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.initialMatrix).toEqual([[4, 7], [2, 6]]);
    }));

    test("Check tilde expansion of initial matrix file", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "home/matrix.json": "[[2]]",
        });
        process.env.INITIAL_MATRIX_FILE = "~/matrix.json";

        jest.doMock("untildify", () => ({
            __esModule: true,
            default: jest.fn((path: string) => path.replace(/^~/, osPath.join(dir, "home"))),
        }));

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.initialMatrix).toEqual([[2]]);
    }));

    test("Check that missing initial matrix file is rejected", withTmpDir(async (dir) => {
        const file = osPath.join(dir, "missing.json");
        process.env.INITIAL_MATRIX_FILE = file;

        await expect(import("../../server/lib/config")).rejects.toThrow(`Unable to read initial matrix from ${ file }`);
    }));

    test("Check that initial matrix file with other content is rejected", withTmpDir(async (dir) => {
        await createFiles(dir, {
            "matrix.json": "{\"matrix\": [[1]]}",
        });
        const file = osPath.join(dir, "matrix.json");
        process.env.INITIAL_MATRIX_FILE = file;

        await expect(import("../../server/lib/config")).rejects.toThrow(
            `${ file } does not contain a rectangular matrix of finite numbers`);
    }));

    test("Check custom inversion tolerance", async () => {
        process.env.INVERSION_TOLERANCE = "1e-10";

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.inversion.tolerance).toBe(1e-10);
    });

    test("Check that zero tolerance is allowed", async () => {
        process.env.INVERSION_TOLERANCE = "0";

        const { default: config } = await import("../../server/lib/config");

        expect(config.app.inversion.tolerance).toBe(0);
    });

    test("Check that invalid tolerance is rejected", async () => {
        for (const value of ["-1", "abc", "Infinity"]) {
            process.env.INVERSION_TOLERANCE = value;
            jest.resetModules();

            await expect(import("../../server/lib/config")).rejects.toThrow(`Invalid INVERSION_TOLERANCE value: ${ value }`);
        }
    });
});
