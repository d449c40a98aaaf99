export * from './admission.port';
export * from './clock.port';
export * from './fingerprint.port';
export * from './image-transformer.port';
export * from './signature-verifier.port';
export * from './source-fetcher.port';
