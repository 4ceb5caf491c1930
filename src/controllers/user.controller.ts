import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { assertImageFile, uploadFileToMinio } from '../helpers/minio.helper';
import { getBody, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import { IUserUpdateInput } from '../models/user.model';
import UserService from '../services/user.service';
import { badRequest } from '../utils/errors';
import Logger from '../utils/logger';
import { isValidCameroonPhone } from '../utils/validations';

const UPDATABLE_FIELDS = ['first_name', 'last_name', 'phone_number', 'bio', 'city'] as const;

class UserController {
    private userService: UserService;
    private context: string;

    constructor(userService: UserService = new UserService()) {
        this.context = 'UserController';
        this.userService = userService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public getUser = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getUser';
        try {
            const { userId } = getAuthUser(req);
            Logger.info('Fetching user', methodContext, { userId });
            const user = await this.userService.getPublicUser(userId);
            res.status(200).json({ success: true, data: user });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public updateUser = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - updateUser';
        try {
            const { userId } = getAuthUser(req);
            const body = getBody(req);

            const input: IUserUpdateInput = {};
            for (const field of UPDATABLE_FIELDS) {
                const value = readString(body, field);
                if (value !== undefined) input[field] = value.trim();
            }
            if (input.phone_number !== undefined && !isValidCameroonPhone(input.phone_number)) {
                throw badRequest('invalid_phone', 'Invalid Cameroonian phone number');
            }
            if (input.first_name === '' || input.last_name === '') {
                throw badRequest('missing_fields', 'Names cannot be empty');
            }

            const user = await this.userService.updateUser(userId, input);
            Logger.info('User updated', methodContext, { userId });
            res.status(200).json({ success: true, data: user });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public updateAvatar = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - updateAvatar';
        try {
            const { userId } = getAuthUser(req);
            const file = req.file;
            if (!file) {
                throw badRequest('missing_file', 'An image file is required');
            }
            assertImageFile(file);

            const url = await uploadFileToMinio(file, `avatars/${userId}`);
            await this.userService.updateAvatar(userId, url);
            Logger.info('Avatar updated', methodContext, { userId });
            res.status(200).json({ success: true, data: { avatar_url: url } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default UserController;
