import dotenv from "dotenv";
import { Server } from "http";
import { createApp } from "./app.js";
import { connectDB, disconnectDB } from "./config/database.js";
import { loadSettings } from "./config/settings.js";
import { createServices } from "./services/index.js";
import { MongoChapterCatalog } from "./services/catalogService.js";
import { MongoAnswerStore } from "./services/answerService.js";
import { MongoNarrativeStore } from "./services/narrativeRepository.js";
import { MongoEntitlementProvider } from "./services/entitlementService.js";
import { MongoLanguagePreferences } from "./services/preferenceService.js";
import { createLanguageModel } from "./utils/languageModel.js";
import { logger } from "./utils/logger.js";
import { secondsToMs } from "./utils/timeUtils.js";

// Load environment variables
dotenv.config();

async function start(): Promise<Server> {
    const settings = loadSettings();
    logger.setLevel(settings.logLevel);

    await connectDB(settings.mongoUri);

    const services = createServices(
        {
            catalog: new MongoChapterCatalog(),
            answers: new MongoAnswerStore(),
            narratives: new MongoNarrativeStore(),
            entitlements: new MongoEntitlementProvider(),
            preferences: new MongoLanguagePreferences(),
            model: createLanguageModel(settings)
        },
        {
            llmTimeoutMs: secondsToMs(settings.llmTimeoutSec),
            defaultLanguage: settings.defaultLanguage
        }
    );

    const app = createApp(services, {
        jwtSecret: settings.jwtSecret,
        adminPersonIds: settings.adminPersonIds
    });

    const server = app.listen(settings.port, () => {
        logger.info(`Server running on http://localhost:${settings.port}`, {
            provider: settings.provider,
            model: settings.modelName,
            defaultLanguage: settings.defaultLanguage
        });
    });

    // A book compile runs one or more multi-minute model calls per chapter
    server.requestTimeout = 0;

    server.on('error', (error) => {
        logger.error('Server error', error);
        process.exitCode = 1;
    });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(() => {
            disconnectDB()
                .catch(error => logger.error('Error closing MongoDB connection', error))
                .finally(() => process.exit(0));
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    return server;
}

start().catch(error => {
    logger.error('Failed to start server', error);
    process.exit(1);
});
