/**
 * Generation Module - Remote artifact synthesis and local artifact storage
 *
 * This module provides:
 * - GenerationClient: image and 3D model generation with result variants
 * - RemoteAppTransport: HTTP calls to the remote generation apps
 * - ContentStore: artifact files on local disk
 */

export {
  GenerationClient,
  NO_DATA_RECEIVED,
  type GenerationClientConfig
} from './GenerationClient.js';

export {
  RemoteAppTransport,
  type GenerationTransport,
  type RemoteAppResponse,
  type RemoteAppTransportConfig
} from './RemoteAppTransport.js';

export {
  ContentStore,
  createContentStore,
  buildArtifactFilename,
  formatTimestamp,
  STAGE_EXTENSIONS,
  type ContentStoreConfig,
  type SavedArtifact,
  type StoredArtifact,
  type ContentStats
} from './ContentStore.js';

export { decodeBase64Strict, decodeResultPayload, isEmptyResult } from './payload.js';
