import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import { errorHandler } from './middleware/error.middleware';
import { initContextMiddleware } from './middleware/init-context.middleware';
import { getPaymentWebhookRoutes } from './routes/payment.route';
import getAPIRouter from './routes/index';

export const app: Application = express();

app.use(cors());
app.use([initContextMiddleware]);

// Gateway callbacks need the unparsed body
app.use('/payments/webhook', getPaymentWebhookRoutes());

app.use(bodyParser.json({ limit: '10mb' }));
app.use(bodyParser.urlencoded({ limit: '10mb', extended: true }));
app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
});

app.use(getAPIRouter());

app.use('*', (_req, res) => {
    res.status(404).json({
        success: false,
        code: 'not_found',
        message: 'Not found',
    });
});

app.use(errorHandler);

export default app;
