import { AuthenticatedUser } from '../models/request.model';

export type RequestContext = {
    requestId: string;
    startedAt: number;
};

export {};

declare global {
    namespace Express {
        // eslint-disable-next-line @typescript-eslint/consistent-type-definitions
        export interface Request {
            user?: AuthenticatedUser;
            context?: RequestContext;
            rawBody?: string;
        }
    }
}
