import type { FastifyInstance } from 'fastify';
import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { ApiError } from '../http/errors';
import { protectedRoute } from '../http/procedures';
import { ok } from '../http/response';

export const UPLOADS_DIR = 'uploads';

// Stores one image under MEDIA_ROOT/uploads and returns its public URL
export async function registerUploadRoute(app: FastifyInstance) {
  app.post('/upload', protectedRoute, async (request) => {
    const file = request.isMultipart() ? await request.file() : undefined;
    if (!file || file.fieldname !== 'file') {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'No file provided' });
    }

    let content: Buffer;
    try {
      content = await file.toBuffer();
    } catch (error) {
      if (error instanceof app.multipartErrors.RequestFileTooLargeError) {
        throw new ApiError({ code: 'PAYLOAD_TOO_LARGE', message: 'File is too large' });
      }
      throw error;
    }

    const name = `${randomUUID().replace(/-/g, '')}${path.extname(file.filename).toLowerCase()}`;
    const dir = path.resolve(app.config.mediaRoot, UPLOADS_DIR);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, name), content);

    request.log.info({ file: name, bytes: content.length }, 'file uploaded');
    const url = `${request.protocol}://${request.hostname}${app.config.mediaUrl}${UPLOADS_DIR}/${name}`;
    return ok({ url }, 'Upload successful');
  });
}
