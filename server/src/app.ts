import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { getConfig, type AppConfig } from './config/env.js';
import { loadPipelineConfig, loadPlacesConfig, type MenuPipelineConfig } from './config/pipeline.config.js';
import { createV1Router } from './routes/v1/index.js';
import { legacyHealthHandler } from './controllers/health.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { createHttpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware.js';
import { BackgroundTasks } from './lib/concurrency/background-tasks.js';
import { createLLMProvider } from './llm/factory.js';
import type { LLMProvider } from './llm/types.js';
import { createRestaurantStore } from './services/store/store.factory.js';
import type { RestaurantStore } from './services/store/restaurant-store.types.js';
import { ApifyPlacesClient } from './services/places/apify-places.client.js';
import type { PlacesProvider } from './services/places/places.types.js';
import { MenuProcessor } from './services/menu/menu-processor.js';
import { ProcessingTrigger } from './services/menu/processing-trigger.js';
import { ScanService } from './services/discovery/scan.service.js';
import { CatalogService } from './services/catalog/catalog.service.js';

export interface AppDependencies {
    store: RestaurantStore;
    /** null disables menu processing (503 on /process-menus) */
    llm: LLMProvider | null;
    /** null disables background discovery */
    places: PlacesProvider | null;
    pipelineConfig: MenuPipelineConfig;
    background: BackgroundTasks;
    scan: AppConfig['scan'];
    frontendOrigins: string[] | null;
}

export function createDependencies(
    config: AppConfig = getConfig(),
    env: NodeJS.ProcessEnv = process.env
): AppDependencies {
    const places = new ApifyPlacesClient(loadPlacesConfig(env));
    return {
        store: createRestaurantStore(config),
        llm: createLLMProvider(config),
        places: places.isConfigured ? places : null,
        pipelineConfig: loadPipelineConfig(env),
        background: new BackgroundTasks(),
        scan: config.scan,
        frontendOrigins: config.frontendOrigins,
    };
}

export function createApp(deps: AppDependencies = createDependencies()) {
    const processor = deps.llm
        ? new MenuProcessor({ llm: deps.llm, store: deps.store, config: deps.pipelineConfig })
        : null;
    const trigger = new ProcessingTrigger(deps.store, processor, deps.background);
    const scan = new ScanService({
        store: deps.store,
        places: deps.places,
        trigger,
        background: deps.background,
        backgroundThreshold: deps.scan.backgroundThreshold,
    });

    const app = express();
    app.use(helmet());

    // Before the body parser so malformed JSON is still traced
    app.use(requestContextMiddleware);
    app.use(createHttpLoggingMiddleware({ quietPaths: ['/healthz', '/api/v1/health'] }));

    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors({ origin: deps.frontendOrigins ?? true }));

    app.use('/api/v1', createV1Router({
        scan,
        catalog: new CatalogService(deps.store),
        processor,
        background: deps.background,
        defaultRadiusKm: deps.scan.defaultRadiusKm,
        placesConfigured: deps.places !== null,
    }));

    app.get('/healthz', legacyHealthHandler);

    app.use(notFoundHandler);
    app.use(errorMiddleware);

    return app;
}
