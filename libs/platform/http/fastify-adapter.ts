import { FastifyAdapter } from '@nestjs/platform-fastify';
import qs from 'qs';
import { NodeEnv } from '../config/env.enums';
import { normalizeNodeEnv } from '../config/env.runtime';
import { parseEnvBoolean } from '../config/env.transforms';

// JSON bodies are small presign requests; file bytes arrive as multipart streams.
const JSON_BODY_LIMIT_BYTES = 64 * 1024;

function parseTrustProxy(value: unknown): boolean | undefined {
  const parsed = parseEnvBoolean(value);
  if (typeof parsed === 'string') {
    throw new Error(`Invalid HTTP_TRUST_PROXY: expected boolean, got "${parsed}"`);
  }
  return parsed;
}

export function createFastifyAdapter(): FastifyAdapter {
  const nodeEnv = normalizeNodeEnv(process.env.NODE_ENV);

  const trustProxy = parseTrustProxy(process.env.HTTP_TRUST_PROXY);
  const productionLike = nodeEnv === NodeEnv.Production || nodeEnv === NodeEnv.Staging;
  if (productionLike && trustProxy === undefined) {
    throw new Error(`Missing required HTTP_TRUST_PROXY for NODE_ENV=${nodeEnv}`);
  }

  return new FastifyAdapter({
    ...(trustProxy !== undefined ? { trustProxy } : {}),
    bodyLimit: JSON_BODY_LIMIT_BYTES,
    routerOptions: {
      querystringParser: (str) =>
        qs.parse(str, {
          allowPrototypes: false,
          plainObjects: true,
          depth: 2,
          parameterLimit: 100,
        }),
    },
  });
}
