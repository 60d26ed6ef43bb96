import { config } from "./config/env";
import { CatalogSession } from "./services/catalogSession";
import { createApp } from "./app";

async function main() {
    const session = new CatalogSession(config.catalogFile, {
        delimiter: config.catalogDelimiter
    });

    // Initial load; the server stays up on failure so an admin can reload
    const result = await session.reload();
    if (result.status === 'unreadable') {
        console.error("Starting without course data");
    }

    const app = createApp(session);
    app.listen(config.port, '0.0.0.0', () => {
        console.log(`server listening on ${config.port}`);
    });
}

main().catch((error) => {
    console.error('Server start-up failed:', error);
    process.exit(1);
});
