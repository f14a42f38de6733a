import { Router, type Request, type Response } from 'express';
import { matchedData } from 'express-validator';
import multer from 'multer';
import type { ImageHostingClient } from '../../services/ospryClient.js';
import type { MetadataStore } from '../../store/metadataStore.js';
import { validateClaim } from '../middlewares/validation.js';

export interface ImagesRouterDeps {
  client: ImageHostingClient;
  store: MetadataStore;
  publicKey: string;
  signedUrlTtlSeconds: number;
  /** Largest accepted file part; bigger uploads are answered with a 400. */
  maxUploadBytes: number;
  now?: () => Date;
}

// Keeps JSON safe to embed inside a <script> element
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function sendRemoteError(res: Response, context: string, error: unknown): void {
  console.error(`${context}:`, error);
  res.status(500).json({
    error: context,
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

export function createImagesRouter(deps: ImagesRouterDeps): Router {
  const { client, store } = deps;
  const now = deps.now ?? (() => new Date());
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes },
  });
  const router = Router();

  const signedUrl = (url: string): string =>
    client.formatUrl(url, {
      timeExpired: new Date(now().getTime() + deps.signedUrlTtlSeconds * 1000),
    });

  /**
   * GET /
   */
  router.get('/', (_req: Request, res: Response) => {
    res.redirect(301, '/images');
  });

  /**
   * GET /images
   * Page listing stored images by public url and by signed private url
   */
  router.get('/images', async (_req: Request, res: Response): Promise<void> => {
    try {
      const metadatas = await store.list();
      const publicUrls = metadatas.map((m) => m.url);
      const privateUrls = metadatas.map((m) => signedUrl(m.url));

      res.render('index', {
        publicUrlsJson: scriptJson(publicUrls),
        privateUrlsJson: scriptJson(privateUrls),
        publicKey: deps.publicKey,
      });
    } catch (error) {
      sendRemoteError(res, 'Failed to list images', error);
    }
  });

  /**
   * POST /images
   * Multipart upload of `file` parts as private images, or a form with
   * method=DELETE that deletes every stored image
   */
  router.post('/images', upload.any(), async (req: Request, res: Response): Promise<void> => {
    if (req.is('application/x-www-form-urlencoded') && req.body?.method === 'DELETE') {
      try {
        for (const metadata of await store.list()) {
          await client.delete(metadata.id);
          await store.deleteById(metadata.id);
        }
      } catch (error) {
        sendRemoteError(res, 'Failed to delete images', error);
        return;
      }
      res.redirect(303, '/images');
      return;
    }

    if (!req.is('multipart/form-data')) {
      res.status(400).json({
        error: 'Invalid upload',
        message: 'expected multipart/form-data',
      });
      return;
    }

    const files = Array.isArray(req.files) ? req.files : [];
    for (const file of files.filter((f) => f.fieldname === 'file')) {
      try {
        const metadata = await client.uploadPrivate(file.originalname, file.buffer);
        await store.insert(metadata);
      } catch (error) {
        console.error(`Error uploading ${file.originalname}:`, error);
      }
    }
    res.redirect(303, '/images');
  });

  const setPrivacy = (isPrivate: boolean) =>
    async (_req: Request, res: Response): Promise<void> => {
      try {
        for (const metadata of await store.list()) {
          if (isPrivate) {
            await client.makePrivate(metadata.id);
          } else {
            await client.makePublic(metadata.id);
          }
        }
      } catch (error) {
        sendRemoteError(res, `Failed to make images ${isPrivate ? 'private' : 'public'}`, error);
        return;
      }
      res.redirect(303, '/images');
    };

  /**
   * POST /make-private
   */
  router.post('/make-private', setPrivacy(true));

  /**
   * POST /make-public
   */
  router.post('/make-public', setPrivacy(false));

  /**
   * POST /claim
   * Claim an image uploaded from the browser and return a signed url to it
   *
   * Body: { "id": "..." }
   * Response: { "privateUrl": "..." }
   */
  router.post('/claim', validateClaim, async (req: Request, res: Response): Promise<void> => {
    try {
      const { id } = matchedData(req);
      const metadata = await client.claim(id);
      await store.insert(metadata);
      res.json({ privateUrl: signedUrl(metadata.url) });
    } catch (error) {
      sendRemoteError(res, 'Failed to claim image', error);
    }
  });

  return router;
}
