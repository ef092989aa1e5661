/**
 * HST Focus Model client
 *
 * Public entry point.
 */

export {
  FocusModelClient,
  getFocusModelClient,
  getModelData,
  assertWithinWindow,
  type ModelDataResult,
} from './client/focus-model-client.js';
export { buildArtifactPaths, buildFormBody, buildFormFields } from './client/request-builder.js';
export { createConfig, DEFAULT_CONFIG, type FocusModelConfig } from './core/config.js';
export {
  CAMERAS,
  OUTPUT_FORMATS,
  MEAN_FOCUS_KEYWORD,
  type Camera,
  type OutputFormat,
} from './core/constants.js';
export {
  FocusModelError,
  InvalidParameterError,
  NetworkError,
  HTTPTimeoutError,
  HTTPStatusError,
  ParseError,
  EmptyTableError,
  MetadataWriteError,
  type ParameterIssue,
} from './core/errors.js';
export type { FocusRow, FocusTable, ImageArtifact, QueryInput, QueryParameters } from './core/types.js';
export {
  addMeanFocusToHeader,
  computeMeanFocus,
  queryFromHeader,
  cameraFromHeader,
  type AnnotateOptions,
  type AnnotationResult,
} from './header/header-annotator.js';
export { FitsHeader } from './header/fits-header.js';
export type { HeaderStore, HeaderValue } from './header/header-store.js';
export { parseFocusTable, parseImage, interpretSubmission } from './parsing/response-parser.js';
export { validateQuery } from './validation/query-validator.js';
