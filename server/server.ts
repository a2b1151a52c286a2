import "dotenv/config";
import config from "./lib/config";
import createServer, { formatAddress } from "./http/http_server";
import createApp from "./api/app";
import logger from "./lib/logger";

function terminationSignal(): Promise<NodeJS.Signals> {
    return new Promise<NodeJS.Signals>((resolve) => {
        process.once("SIGINT", resolve);
        process.once("SIGTERM", resolve);
    });
}

export async function main(termination: Promise<NodeJS.Signals> = terminationSignal()): Promise<void> {
    const httpServer = createServer(config.http, createApp(config.app, config.environment));

    httpServer.on("listenHost", (host, port) => {
        logger.info(`> Starting HTTP server to listen at http://${ host }:${ port !== 0 ? port : "<?>" } as ${
            config.environment }`);
    });
    httpServer.on("listeningAddress", (address) => {
        logger.info(`> HTTP server listening at http://${ formatAddress(address) } as ${ config.environment }`);
    });

    await httpServer.listen();

    logger.info(`Inversion tolerance: ${ config.app.inversion.tolerance }`);

    const signal = await termination;

    logger.info(`Terminating on ${ signal }...`);

    await httpServer.close();

    logger.info("Terminated");
}

if (require.main === module) {
    main().catch((err: unknown) => {
        logger.error("Server failed", { err });
        process.exitCode = 1;
    });
}
