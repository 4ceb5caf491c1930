import { OAuth2Client, TokenPayload } from 'google-auth-library';
import { appConfig } from '../config';
import { GoogleSignupInput } from '../models/user.model';
import { unauthorized } from '../utils/errors';
import Logger from '../utils/logger';

export default class GoogleService {
    private client: OAuth2Client;
    private context: string;

    constructor(client: OAuth2Client = new OAuth2Client()) {
        this.context = 'GoogleService';
        this.client = client;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public verifyGoogleToken = async (token: string): Promise<GoogleSignupInput> => {
        const methodContext = this.context + ' - verifyGoogleToken';
        Logger.info('Starting verification', methodContext);

        if (!token) {
            throw unauthorized('invalid_google_token', 'No token provided');
        }

        let payload: TokenPayload | undefined;
        try {
            const ticket = await this.client.verifyIdToken({
                idToken: token,
                audience: appConfig.googleClientId,
            });
            payload = ticket.getPayload();
        } catch (error) {
            Logger.error('Token verification failed', methodContext, error);
            throw unauthorized('invalid_google_token', 'Invalid Google token');
        }

        if (!payload || !payload.email) {
            Logger.error('No email found in token', methodContext);
            throw unauthorized('invalid_google_token', 'No email found in token');
        }

        Logger.info('Token verified successfully', methodContext, payload.email);
        return {
            google_id: payload.sub,
            email: payload.email,
            first_name: payload.given_name ?? '',
            last_name: payload.family_name ?? '',
        };
    };
}
