import nodemailer from 'nodemailer';
import { appConfig } from '../config';
import Logger from '../utils/logger';

export type MailMessage = {
    to: string;
    subject: string;
    html: string;
    text?: string;
};

export type MailTransport = {
    sendMail(message: MailMessage & { from: string }): Promise<{ messageId: string }>;
};

// Null when SMTP is not configured
export const createSmtpTransport = (): MailTransport | null => {
    const { host, port, secure, user, password } = appConfig.smtp;
    if (!host) return null;

    return nodemailer.createTransport({
        host,
        port,
        secure,
        auth: user ? { user, pass: password } : undefined,
    });
};

class EmailService {
    private transporter: MailTransport | null;
    private context: string;

    constructor(transporter: MailTransport | null = createSmtpTransport()) {
        this.context = 'EmailService';
        this.transporter = transporter;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    /**
     * Resolves false when no transport is configured.
     */
    public sendEmail = async (message: MailMessage): Promise<boolean> => {
        const methodContext = this.context + ' - sendEmail';
        Logger.info('Sending email', methodContext, {
            to: message.to,
            subject: message.subject,
        });

        if (!this.transporter) {
            Logger.warn('SMTP not configured, email skipped', methodContext);
            return false;
        }

        const info = await this.transporter.sendMail({
            from: appConfig.smtp.from,
            ...message,
        });
        Logger.info('Email sent successfully', methodContext, {
            to: message.to,
            messageId: info.messageId,
        });
        return true;
    };
}

export { EmailService };
