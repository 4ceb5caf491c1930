import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { parsePagination } from '../helpers/property.helper';
import { getBody, readParam, readQueryString, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import NotificationService from '../services/notification.service';
import Logger from '../utils/logger';

class NotificationController {
    private service: NotificationService;
    private context: string;

    constructor(service: NotificationService = new NotificationService()) {
        this.context = 'NotificationController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public list = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - list';
        try {
            const notifications = await this.service.listNotifications(
                getAuthUser(req).userId,
                parsePagination(req.query),
                readQueryString(req, 'unread') === 'true',
            );
            res.status(200).json({ success: true, data: notifications });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public markAsRead = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - markAsRead';
        try {
            await this.service.markAsRead(readParam(req, 'id'), getAuthUser(req).userId);
            res.status(200).json({ success: true, data: { message: 'Notification read' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public markAllAsRead = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - markAllAsRead';
        try {
            const updated = await this.service.markAllAsRead(getAuthUser(req).userId);
            res.status(200).json({ success: true, data: { updated } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public registerDevice = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - registerDevice';
        try {
            const body = getBody(req);
            const device = await this.service.registerDevice(
                getAuthUser(req).userId,
                readString(body, 'token') ?? '',
                readString(body, 'platform') ?? '',
            );
            res.status(201).json({ success: true, data: device });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default NotificationController;
