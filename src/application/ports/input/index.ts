/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 */
export type {
  DownloadModelPort,
  DownloadModelCommand,
  DownloadModelOptions,
  DownloadModelResult,
} from './download-model.port';
