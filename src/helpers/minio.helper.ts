import path from 'path';
import { appConfig } from '../config';
import { minioClient } from '../minio';
import { badRequest } from '../utils/errors';
import Logger from '../utils/logger';

export type UploadableFile = {
    buffer: Buffer;
    mimetype: string;
    originalname: string;
    size: number;
};

const ALLOWED_IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/webp'];

export const assertImageFile = (file: UploadableFile): void => {
    if (!ALLOWED_IMAGE_TYPES.includes(file.mimetype)) {
        throw badRequest(
            'unsupported_file_type',
            `Unsupported image type ${file.mimetype}`,
        );
    }
};

const buildObjectName = (folder: string, file: UploadableFile): string => {
    const extension =
        path.extname(file.originalname).toLowerCase() ||
        `.${file.mimetype.split('/')[1] ?? 'bin'}`;
    return `${folder}/${Date.now()}-${Math.round(Math.random() * 1e6)}${extension}`;
};

export const uploadFileToMinio = async (
    file: UploadableFile,
    folder: string,
): Promise<string> => {
    const methodContext = 'MinioHelper - uploadFileToMinio';
    const objectName = buildObjectName(folder, file);

    if (!minioClient) {
        Logger.warn('MinIO client not configured, skipping file upload', methodContext);
        return `placeholder://${objectName}`;
    }

    const { bucket, publicEndpoint, endpoint } = appConfig.minio;
    try {
        Logger.info('Starting file upload to MinIO', methodContext, {
            objectName,
            fileSize: file.size,
        });

        const bucketExists = await minioClient.bucketExists(bucket);
        if (!bucketExists) {
            Logger.info('Creating bucket', methodContext, { bucket });
            await minioClient.makeBucket(bucket);

            const policy = {
                Version: '2012-10-17',
                Statement: [
                    {
                        Effect: 'Allow',
                        Principal: { AWS: ['*'] },
                        Action: ['s3:GetObject'],
                        Resource: [`arn:aws:s3:::${bucket}/*`],
                    },
                ],
            };
            await minioClient.setBucketPolicy(bucket, JSON.stringify(policy));
        }

        await minioClient.putObject(bucket, objectName, file.buffer, file.size, {
            'Content-Type': file.mimetype,
        });

        const fileUrl = `https://${publicEndpoint || endpoint}/${bucket}/${objectName}`;
        Logger.info('Upload successful', methodContext, fileUrl);
        return fileUrl;
    } catch (error) {
        Logger.error('Error uploading file', methodContext, error);
        throw error;
    }
};

// Failures are logged, not thrown
export const removeFileFromMinio = async (fileUrl: string): Promise<void> => {
    const methodContext = 'MinioHelper - removeFileFromMinio';
    if (!minioClient || fileUrl.startsWith('placeholder://')) return;

    const { bucket } = appConfig.minio;
    const marker = `/${bucket}/`;
    const index = fileUrl.indexOf(marker);
    if (index === -1) return;

    try {
        await minioClient.removeObject(bucket, fileUrl.slice(index + marker.length));
    } catch (error) {
        Logger.warn('Could not remove file', methodContext, error);
    }
};
