import { ConfigService } from '@nestjs/config';
import type { FactoryProvider } from '@nestjs/common';
import type { StorageProvider } from './interfaces';
import { S3StorageProvider } from './providers';

export const STORAGE_PROVIDER = 'STORAGE_PROVIDER';

/**
 * S3-compatible blob store (MinIO in development) built from STORAGE_* keys
 */
export const storageProviderFactory: FactoryProvider<StorageProvider> = {
  provide: STORAGE_PROVIDER,
  useFactory: (configService: ConfigService): StorageProvider => {
    const host = configService.get<string>('STORAGE_ENDPOINT', 'localhost');
    const port = configService.get<string>('STORAGE_PORT', '9000');
    const scheme =
      configService.get<string>('STORAGE_USE_SSL', 'false') === 'true'
        ? 'https'
        : 'http';

    return new S3StorageProvider({
      endpoint: `${scheme}://${host}:${port}`,
      region: configService.get<string>('STORAGE_REGION', 'us-east-1'),
      accessKeyId: configService.get<string>('STORAGE_ACCESS_KEY', 'minioadmin'),
      secretAccessKey: configService.get<string>(
        'STORAGE_SECRET_KEY',
        'minioadmin',
      ),
      bucket: configService.get<string>('STORAGE_BUCKET', 'memoires'),
      forcePathStyle:
        configService.get<string>('STORAGE_FORCE_PATH_STYLE', 'true') ===
        'true',
    });
  },
  inject: [ConfigService],
};
