/**
 * tmplroute
 *
 * Core module: filesystem contract, segment matching, template assembly and
 * request data. For the server and runtimes, use sub-exports:
 *   tmplroute/server          TemplateServer, createTemplateServer
 *   tmplroute/runtime/node    NodeFsRuntime
 *   tmplroute/runtime/memory  MemoryFsRuntime
 */

// Types
export {
  type DirEntry,
  type FileInfo,
  FileSystemError,
  type FileSystemErrorCode,
  isNotFound,
  joinPath,
  readAll,
  READ_CHUNK_SIZE,
  splitPath,
  type TemplateFile,
  type TemplateFs,
  toReadableStream,
} from './type/fs.type.ts';

export {
  type DescentResult,
  type DirEntryWithSubmatches,
  fromFsError,
  isResolutionError,
  type KeyValuePair,
  type PathExpressionSubmatches,
  ResolutionError,
  type ResolutionErrorKind,
} from './type/resolution.type.ts';

// Logging
export { type Logger, type LogLevel, logger, setLogger } from './type/logger.type.ts';
export { type ConsoleLike, createConsoleLogger } from './util/logger.util.ts';

// Route matching
export {
  compilePattern,
  type CompiledPattern,
  execPattern,
  isPatternSegment,
  type SegmentMatch,
  SegmentMatcher,
  translatePattern,
} from './route/segment.matcher.ts';

// Templates
export {
  BODY,
  HEAD,
  HIDDEN_EXTENSION,
  LAYOUT_TEMPLATE,
  NOT_FOUND_MARKER,
  TEMPLATE_SUFFIX,
} from './template/layout.ts';
export { type HelperMap, TemplateSet } from './template/template.set.ts';
export { TemplateAssembler, type TemplateAssemblerOptions } from './template/template.assembler.ts';

// Utils
export {
  contentTypeByExtension,
  detectContentType,
  OCTET_STREAM,
  readPrefix,
  resolveContentType,
  SNIFF_LENGTH,
  type SniffedContent,
  TEXT_HTML,
  TEXT_PLAIN,
} from './util/content-type.util.ts';

export {
  bindRequestData,
  namedSubmatches,
  type RequestData,
  type RequestDataFactory,
  RequestDataMap,
  RouteParamsData,
} from './util/request-data.util.ts';
