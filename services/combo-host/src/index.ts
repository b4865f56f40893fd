import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { createComboApp } from "../../../libs/ingress/comboRoutes.js";
import { logger } from "../../../libs/logging/logger.js";

async function main() {
    const runtime = await bootstrap("combo-host");
    const app = createComboApp(runtime.host);

    const server = app.listen(runtime.config.port, () => {
        logger.info({
            port: runtime.config.port,
            programId: runtime.config.programId,
            store: runtime.config.store
        }, "Combo host listening");
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down combo host");
        server.close(() => {
            runtime.close().then(
                () => process.exit(0),
                (err: unknown) => {
                    logger.error({ err }, "Failed to close runtime");
                    process.exit(1);
                }
            );
        });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
