import { createServer as createHttpServer, Server } from "http";
import { TypedEmitter } from "tiny-typed-emitter";
import type { AddressInfo } from "node:net";
import type express from "express";
import type { Http } from "../lib/config";
import logger from "../lib/logger";

interface HttpServerEvents {
    "listenHost": (host: string, port: number) => void,
    "listeningAddress": (address: AddressInfo) => void,
}

export function formatAddress(address: AddressInfo): string {
    const host = address.family === "IPv6" ? `[${ address.address }]` : address.address;
    return `${ host }:${ address.port }`;
}

function tcpAddress(httpServer: Server): AddressInfo | undefined {
    const address = httpServer.address();
    return address !== null && typeof address !== "string" ? address : undefined;
}

export class HttpServer extends TypedEmitter<HttpServerEvents> {
    private readonly httpServers: Server[] = [];

    constructor(private http: Http, private app: express.Express) {
        super();
    }

    public async listen(): Promise<void> {
        const listenPromises: Promise<void>[] = [];

        this.http.serverOptions.hosts.forEach((host) => {
            this.http.serverOptions.ports.forEach((port) => {
                this.emit("listenHost", host ?? "*", port);

                const httpServer = createHttpServer(this.app);
                listenPromises.push(new Promise<void>((resolve, reject) => {
                    const onListening = () => {
                        const address = tcpAddress(httpServer);
                        if (address) {
                            this.emit("listeningAddress", address);
                        }
                        httpServer.off("error", reject);
                        resolve();
                    };
                    httpServer.on("error", reject);
                    if (host) {
                        httpServer.listen(port, host, onListening);
                    } else {
                        httpServer.listen(port, onListening);
                    }
                }));
                this.httpServers.push(httpServer);
            });
        });

        try {
            await Promise.all(listenPromises);
        } finally {
            await Promise.allSettled(listenPromises);
        }
    }

    public get addresses(): AddressInfo[] {
        return this.httpServers
            .map(tcpAddress)
            .filter((address): address is AddressInfo => address !== undefined);
    }

    public async close(): Promise<void> {
        const stopPromises = this.httpServers.map((httpServer) => new Promise<void>((resolve, reject) => {
            if (httpServer.listening) {
                httpServer.close((err?: Error) => (err ? reject(err) : resolve()));
            } else {
                resolve();
            }
        }));

        try {
            await Promise.all(stopPromises);
        } catch (err) {
            logger.error("Error closing server:", { err });
        } finally {
            await Promise.allSettled(stopPromises);
        }
    }
}

export default function createServer(httpConfig: Http, app: express.Express): HttpServer {
    return new HttpServer(httpConfig, app);
}
