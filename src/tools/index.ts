export { FfprobeProber, parseProbeOutput, ffprobeOutputSchema } from './prober.js';
export type { MetadataProber, FfprobeOutput } from './prober.js';

export { HandBrakeEncoder } from './encoder.js';
export type { Encoder, EncodeRequest } from './encoder.js';

export { RsyncCopier } from './copier.js';
export type { RemoteCopier } from './copier.js';

export { verifyDependencies } from './dependencies.js';
