import _ from "lodash";
import fsExtra from "fs-extra";
import untildify from "untildify";
import logger from "./logger";
import type { InversionOptions } from "./inverter";
import { dimensions, isMatrix, type Matrix } from "./matrix";

export type Hosts = [null] | [string, ...string[]];

export type HttpServerOptions = { hosts: Hosts, ports: number[] };

export type Http = {
    serverOptions: HttpServerOptions,
};

export type AppConfig = {
    initialMatrix: Matrix,
    inversion: InversionOptions,
    bodyLimit: string,
};

export type Environment = "production" | "development" | "test";

export type Config = {
    environment: Environment,
    app: AppConfig,
    http: Http,
};

const DEFAULT_MATRIX: Matrix = [[1]];

const environment: Environment = process.env.NODE_ENV === "production" ?
    "production" :
    process.env.NODE_ENV === "test" ?
        "test" :
        "development";

function splitList(value: string | undefined): string[] {
    return _.uniq((value?.split(",") ?? []).map((item) => item.trim()).filter(Boolean));
}

function checkMatrix(source: string, value: unknown): Matrix {
    if (!isMatrix(value)) {
        throw new Error(`${ source } does not contain a rectangular matrix of finite numbers`);
    }
    return value;
}

function readInitialMatrix(): Matrix {
    const fileEnv = process.env.INITIAL_MATRIX_FILE?.trim();
    if (fileEnv) {
        const file = untildify(fileEnv);
        let content: unknown;
        try {
            content = fsExtra.readJsonSync(file);
        } catch (err: unknown) {
            throw new Error(`Unable to read initial matrix from ${ file }`, { cause: err });
        }
        return checkMatrix(file, content);
    }

    const inlineEnv = process.env.INITIAL_MATRIX?.trim();
    if (inlineEnv) {
        let content: unknown;
        try {
            content = JSON.parse(inlineEnv);
        } catch (err: unknown) {
            throw new Error("Unable to parse INITIAL_MATRIX as JSON", { cause: err });
        }
        return checkMatrix("INITIAL_MATRIX", content);
    }

    return DEFAULT_MATRIX;
}

function readTolerance(): number {
    const toleranceEnv = process.env.INVERSION_TOLERANCE?.trim();
    if (!toleranceEnv) {
        return Number.EPSILON;
    }
    const tolerance = Number(toleranceEnv);
    if (!Number.isFinite(tolerance) || tolerance < 0) {
        throw new Error(`Invalid INVERSION_TOLERANCE value: ${ toleranceEnv }`);
    }
    return tolerance;
}

function parsePortList(ports: string | undefined, defaultPort: number): number[] {
    const portList = splitList(ports);
    if (_.isEmpty(portList)) {
        return [defaultPort];
    }
    return portList.map((port) => {
        const parsed = Number(port);
        if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
            throw new Error(`Invalid HTTP_PORT value: ${ port }`);
        }
        return parsed;
    });
}

function parseHosts(hosts: string | undefined): Hosts {
    const hostList = splitList(hosts);
    if (hostList.length > 0) {
        const [first, ...rest] = hostList;
        return [first, ...rest];
    }
    return environment === "production" ? [null] : ["localhost"];
}

const initialMatrix = readInitialMatrix();
const [rows, columns] = dimensions(initialMatrix);
logger.debug(`Initial matrix is ${ rows }x${ columns }`);

const app: AppConfig = {
    initialMatrix,
    inversion: {
        tolerance: readTolerance(),
    },
    bodyLimit: process.env.BODY_SIZE_LIMIT?.trim() || "100kb",
};

const http: Http = {
    serverOptions: {
        hosts: parseHosts(process.env.HTTP_HOST),
        ports: parsePortList(process.env.HTTP_PORT, 3000),
    },
};

const config: Config = {
    environment,
    app,
    http,
};

export default config;
