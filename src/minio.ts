import * as Minio from 'minio';
import { appConfig } from './config';

const { endpoint, port, useSSL, accessKey, secretKey } = appConfig.minio;

// Only initialize MinIO client if its settings are present
export const minioClient =
    endpoint && accessKey && secretKey
        ? new Minio.Client({
              endPoint: endpoint,
              port,
              useSSL,
              accessKey,
              secretKey,
          })
        : null;
