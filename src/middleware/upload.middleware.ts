import multer from 'multer';
import { MAX_IMAGE_SIZE, MAX_PROPERTY_IMAGES } from '../utils/constants';

// Files stay in memory as buffers until they are pushed to MinIO
export const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_IMAGE_SIZE, files: MAX_PROPERTY_IMAGES },
});

export default upload;
