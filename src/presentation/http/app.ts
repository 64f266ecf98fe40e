import express, { type ErrorRequestHandler, type Express } from 'express';
import appConfig, { type Config } from '../../config';
import type { IResourceRepository, ILogger } from '../../domain/interfaces';
import { HTTP_ERRORS } from '../../domain/value-objects/HttpError';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { InMemoryResourceRepository } from '../../infrastructure/repository/InMemoryResourceRepository';
import { CorsPolicy } from '../../infrastructure/http/CorsPolicy';
import { HttpErrorHandler } from '../../infrastructure/http/HttpErrorHandler';
import { MiddlewareSet, requestLogger } from '../../infrastructure/http/MiddlewareSet';
import { ListResourcesUseCase } from '../../application/use-cases/ListResourcesUseCase';
import { AddResourceUseCase } from '../../application/use-cases/AddResourceUseCase';
import { RemoveResourceUseCase } from '../../application/use-cases/RemoveResourceUseCase';
import { ResourceController } from './controllers/ResourceController';
import { createResourceRoutes } from './routes/resource.routes';

export interface AppDependencies {
    config?: Config;
    logger?: ILogger;
    resourceRepository?: IResourceRepository;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(dependencies: AppDependencies = {}): Express {
    // Initialize dependencies (allow injection for testing)
    const config = dependencies.config ?? appConfig;
    const logger = dependencies.logger ?? new ConsoleLogger(config.LOG_LEVEL);
    const repository = dependencies.resourceRepository ?? new InMemoryResourceRepository(logger);

    // Initialize use cases
    const listResourcesUseCase = new ListResourcesUseCase(repository, logger, {
        units: config.RANGE_UNITS,
        maxRangeLength: config.MAX_RANGE_LENGTH
    });
    const addResourceUseCase = new AddResourceUseCase(repository, logger);
    const removeResourceUseCase = new RemoveResourceUseCase(repository, logger);

    // Initialize controllers
    const resourceController = new ResourceController(
        listResourcesUseCase,
        addResourceUseCase,
        removeResourceUseCase,
        config.RANGE_UNITS
    );

    // Request decorators, outermost first
    const middleware = new MiddlewareSet();
    middleware.use(requestLogger(logger));
    middleware.use(CorsPolicy.fromConfig(config).middleware());

    // Initialize Express app
    const app: Express = express();
    app.use(express.json());

    // Setup routes
    app.use('/', middleware.apply(createResourceRoutes(resourceController)));

    app.use((_req, res) => {
        HttpErrorHandler.send(res, HTTP_ERRORS.ROUTE_NOT_FOUND);
    });

    const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
        if (error instanceof SyntaxError) {
            HttpErrorHandler.send(res, HTTP_ERRORS.MALFORMED_BODY);
            return;
        }
        HttpErrorHandler.handle(error, res, logger, `${req.method} ${req.path}`);
    };
    app.use(errorHandler);

    return app;
}
