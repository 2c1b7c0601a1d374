import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { AppConfig } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { getRequestContext, requestContextMiddleware } from './middleware/requestContext';
import { resumeUpload } from './middleware/upload';
import { AnalysisService, toAnalysisResponse, toUpstreamErrorDetail } from './services/analysisService';
import { extractResumeText } from './services/documentService';
import { ModelCatalogService } from './services/modelCatalogService';
import { type FetchLike, OpenRouterClient } from './services/openRouterClient';
import type { AnalysisRequest, ErrorResponse } from './types/analysis';
import { UpstreamError } from './utils/errors';
import logger, { logRequest } from './utils/logger';
import { validateAnalysisFileFields, validateAnalysisRequest } from './utils/validators';

export interface AppServices {
	modelCatalog: ModelCatalogService;
	analysis: AnalysisService;
}

export function createServices(config: AppConfig, fetchImpl?: FetchLike): AppServices {
	const client = new OpenRouterClient(config.openRouter, fetchImpl);
	return {
		modelCatalog: new ModelCatalogService(client),
		analysis: new AnalysisService(client),
	};
}

export function createApp(services: AppServices) {
	const app = express();

	// Any origin, method and header
	app.use(cors());
	app.use(express.json({ limit: '10mb' }));
	app.use(requestContextMiddleware);

	async function sendAnalysis(req: Request, res: Response, request: AnalysisRequest) {
		const { requestId, startTime } = getRequestContext(req);
		try {
			const outcome = await services.analysis.analyze(request);
			logger.info('Analysis response sent', {
				requestId,
				model: outcome.modelUsed,
				processingTime: Date.now() - startTime,
			});
			res.json(toAnalysisResponse(outcome));
		} catch (error) {
			if (error instanceof UpstreamError) {
				logger.warn('Analysis failed', {
					requestId,
					code: error.code,
					statusCode: error.statusCode,
					message: error.message,
				});
				const body: ErrorResponse = { detail: toUpstreamErrorDetail(error) };
				res.status(502).json(body);
				return;
			}
			throw error;
		}
	}

	// Liveness only; the upstream is not contacted
	app.get('/health', (req: Request, res: Response) => {
		logRequest('GET', '/health', { requestId: getRequestContext(req).requestId });
		res.json({ status: 'ok' });
	});

	app.get('/models', async (req: Request, res: Response, next: NextFunction) => {
		const { requestId } = getRequestContext(req);
		logRequest('GET', '/models', { requestId });
		try {
			const models = await services.modelCatalog.listModels();
			logger.info('Model list sent', { requestId, count: models.length });
			res.json(models);
		} catch (error) {
			next(error);
		}
	});

	app.post('/analyze', async (req: Request, res: Response, next: NextFunction) => {
		logRequest('POST', '/analyze', { requestId: getRequestContext(req).requestId });
		try {
			const request = validateAnalysisRequest(req.body);
			await sendAnalysis(req, res, request);
		} catch (error) {
			next(error);
		}
	});

	app.post('/analyze/file', resumeUpload, async (req: Request, res: Response, next: NextFunction) => {
		const { requestId } = getRequestContext(req);
		logRequest('POST', '/analyze/file', { requestId, filename: req.file?.originalname });
		try {
			if (!req.file) {
				const body: ErrorResponse = { detail: 'Resume file is required' };
				res.status(400).json(body);
				return;
			}
			const fields = validateAnalysisFileFields(req.body);
			const resumeText = await extractResumeText({
				filename: req.file.originalname,
				buffer: req.file.buffer,
			});
			await sendAnalysis(req, res, {
				resume_text: resumeText,
				job_posting: fields.job_posting,
				model_id: fields.model_id,
			});
		} catch (error) {
			next(error);
		}
	});

	app.use(notFoundHandler);
	app.use(errorHandler);

	return app;
}
