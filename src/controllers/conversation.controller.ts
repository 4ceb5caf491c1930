import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { parsePagination } from '../helpers/property.helper';
import { getBody, readParam, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import ConversationService from '../services/conversation.service';
import Logger from '../utils/logger';

class ConversationController {
    private service: ConversationService;
    private context: string;

    constructor(service: ConversationService = new ConversationService()) {
        this.context = 'ConversationController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public startConversation = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - startConversation';
        try {
            const body = getBody(req);
            const conversation = await this.service.findOrCreateConversation(
                getAuthUser(req).userId,
                readString(body, 'recipient_id') ?? '',
                readString(body, 'property_id') || undefined,
            );
            res.status(200).json({ success: true, data: conversation });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getConversations = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getConversations';
        try {
            const conversations = await this.service.getConversations(getAuthUser(req).userId);
            res.status(200).json({ success: true, data: conversations });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getConversation = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getConversation';
        try {
            const conversation = await this.service.getConversation(
                readParam(req, 'id'),
                getAuthUser(req).userId,
            );
            res.status(200).json({ success: true, data: conversation });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getMessages = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getMessages';
        try {
            const messages = await this.service.getMessages(
                readParam(req, 'id'),
                getAuthUser(req).userId,
                parsePagination(req.query),
            );
            res.status(200).json({ success: true, data: messages });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public sendMessage = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - sendMessage';
        try {
            const result = await this.service.sendMessage(
                readParam(req, 'id'),
                getAuthUser(req).userId,
                readString(getBody(req), 'content') ?? '',
            );
            res.status(201).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public markAsRead = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - markAsRead';
        try {
            const updated = await this.service.markAsRead(readParam(req, 'id'), getAuthUser(req).userId);
            res.status(200).json({ success: true, data: { updated } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default ConversationController;
