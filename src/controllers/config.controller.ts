import { Request, Response } from 'express';
import { getBody, readParam, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import ConfigService from '../services/config.service';
import Logger from '../utils/logger';

class ConfigController {
    private service: ConfigService;
    private context: string;

    constructor(service: ConfigService = new ConfigService()) {
        this.context = 'ConfigController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public getAll = async (_req: Request, res: Response) => {
        const methodContext = this.context + ' - getAll';
        try {
            Logger.info('Starting', methodContext);
            res.status(200).json({ success: true, data: await this.service.getAll() });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public update = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - update';
        try {
            const body = getBody(req);
            const entry = await this.service.setValue(
                readParam(req, 'key'),
                readString(body, 'value') ?? '',
                readString(body, 'description'),
            );
            res.status(200).json({ success: true, data: entry });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public initializeDefaults = async (_req: Request, res: Response) => {
        const methodContext = this.context + ' - initializeDefaults';
        try {
            const created = await this.service.initializeDefaults();
            res.status(200).json({ success: true, data: { created } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default ConfigController;
