/**
 * Use Cases Barrel Export
 */
export { ProcessImageUseCase } from './process-image.use-case';
