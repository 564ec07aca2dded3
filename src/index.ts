export { readAudio } from './audio/segmentReader.js';
export { streamAudio, samplesForDuration } from './audio/chunkStreamer.js';
export { validateDecodeParameters } from './audio/parameters.js';
export type { ParameterDefaults, RawDecodeParameters, ValidatedDecodeParameters } from './audio/parameters.js';
export { buildDecodeInvocation, buildOutputFilter, formatSeconds } from './audio/invocation.js';
export { runDecoder, DecoderProcess } from './audio/supervisor.js';
export type { RunDecoderOptions } from './audio/supervisor.js';
export { ensureDecoderAvailable, resetDecoderProbeCache, resolveDecoderCommand } from './audio/toolProbe.js';
export { decodeFloat32Frames, concatSamples } from './audio/sampleDecoder.js';
export type { DecodedFrames } from './audio/sampleDecoder.js';
export { classifyDecoderFailure, matchDiagnostics, DIAGNOSTIC_SIGNATURES } from './audio/errorClassifier.js';
export type { DecoderFailureContext, DiagnosticKind, DiagnosticSignature } from './audio/errorClassifier.js';
export { summarizeSamples } from './audio/stats.js';
export type { SampleSummary } from './audio/stats.js';
export { loadConfig, reloadConfig, DEFAULT_CHUNK_DURATION_SEC, DEFAULT_TIMEOUT_MS } from './config.js';
export { loadEnvironment } from './utils/env.js';
export * from './errors.js';
export * from './types.js';
