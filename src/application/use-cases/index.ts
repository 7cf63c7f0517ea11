/**
 * Use Cases Barrel Export
 */
export { DownloadModelUseCase } from './download-model.use-case';
