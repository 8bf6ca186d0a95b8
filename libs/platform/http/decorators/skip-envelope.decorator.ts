import { SetMetadata } from '@nestjs/common';

export const SKIP_ENVELOPE_KEY = 'http:skip-envelope';

/** Returns the handler result as-is (streams, health probes, pre-shaped bodies). */
export const SkipEnvelope = () => SetMetadata(SKIP_ENVELOPE_KEY, true);
