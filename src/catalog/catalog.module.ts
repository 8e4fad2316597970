import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CatalogConfig } from '../config/configuration';
import { ArrayExpressClient } from './arrayexpress/arrayexpress.client';
import {
  ENTREZ_INTERVAL_MS,
  ENTREZ_INTERVAL_WITH_KEY_MS,
} from './geo/geo.constants';
import { GeoClient } from './geo/geo.client';
import { CatalogHttpClient } from './http/catalog-http.client';

export const CATALOG_HTTP = Symbol('CATALOG_HTTP');

@Module({
  providers: [
    {
      provide: GeoClient,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = configService.getOrThrow<CatalogConfig>('catalog');
        const http = new CatalogHttpClient({
          name: 'geo',
          timeoutMs: config.timeoutMs,
          maxRetries: config.maxRetries,
          proxyUrl: config.proxyUrl,
          minIntervalMs: config.ncbiApiKey
            ? ENTREZ_INTERVAL_WITH_KEY_MS
            : ENTREZ_INTERVAL_MS,
        });
        return new GeoClient(http, {
          apiKey: config.ncbiApiKey,
          email: config.ncbiEmail,
        });
      },
    },
    {
      provide: ArrayExpressClient,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = configService.getOrThrow<CatalogConfig>('catalog');
        return new ArrayExpressClient(
          new CatalogHttpClient({
            name: 'arrayexpress',
            timeoutMs: config.timeoutMs,
            maxRetries: config.maxRetries,
            proxyUrl: config.proxyUrl,
            minIntervalMs: 100,
          }),
        );
      },
    },
    {
      // Raw file downloads go through their own client: no API rate limit applies
      provide: CATALOG_HTTP,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = configService.getOrThrow<CatalogConfig>('catalog');
        return new CatalogHttpClient({
          name: 'files',
          timeoutMs: config.timeoutMs,
          maxRetries: config.maxRetries,
          proxyUrl: config.proxyUrl,
        });
      },
    },
  ],
  exports: [GeoClient, ArrayExpressClient, CATALOG_HTTP],
})
export class CatalogModule {}
