import dotenv from 'dotenv';

dotenv.config();

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '8080', 10),

  ospry: {
    secretKey: process.env.OSPRY_SECRET_KEY || '',
    publicKey: process.env.OSPRY_PUBLIC_KEY || '',
    serverUrl: process.env.OSPRY_SERVER_URL || 'https://api.ospry.io/v1',
  },

  demo: {
    signedUrlTtlSeconds: parseInt(process.env.SIGNED_URL_TTL_SECONDS || '60', 10),
    maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(20 * 1024 * 1024), 10),
  },
};
