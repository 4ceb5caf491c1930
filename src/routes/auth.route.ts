import { Router } from 'express';
import AuthController from '../controllers/auth.controller';
import { authenticateUser, validateRequestBody } from '../middleware/auth.middleware';

class AuthRoutes {
    private router: Router;
    private authController: AuthController;

    constructor() {
        this.router = Router();
        this.authController = new AuthController();
        this.initializeRoutes();
    }

    private initializeRoutes(): void {
        this.router.post(
            '/register',
            validateRequestBody(['email', 'password', 'phone_number', 'first_name', 'last_name']),
            this.authController.register,
        );

        this.router.post(
            '/login',
            validateRequestBody(['email', 'password']),
            this.authController.signinWithEmail,
        );

        this.router.post(
            '/google',
            validateRequestBody(['idToken']),
            this.authController.googleSignIn,
        );

        // Token management
        this.router.post(
            '/refresh',
            validateRequestBody(['refresh_token']),
            this.authController.refreshToken,
        );

        this.router.post('/signout', authenticateUser, this.authController.signout);

        // Passwords
        this.router.post(
            '/password/change',
            authenticateUser,
            validateRequestBody(['current_password', 'new_password']),
            this.authController.changePassword,
        );

        this.router.post(
            '/password/reset',
            validateRequestBody(['email']),
            this.authController.requestPasswordReset,
        );

        this.router.post(
            '/password/reset/validate',
            validateRequestBody(['token']),
            this.authController.validateResetToken,
        );

        this.router.post(
            '/password/reset/confirm',
            validateRequestBody(['token', 'new_password']),
            this.authController.confirmPasswordReset,
        );
    }

    public getRouter(): Router {
        return this.router;
    }
}

export const getAuthRoutes = (): Router => {
    const authRoutes = new AuthRoutes();
    return authRoutes.getRouter();
};

export default getAuthRoutes;
