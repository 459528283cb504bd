/**
 * Embedding Model Variants
 *
 * Titan text embedding models differ in request shape and output size.
 * The variant is resolved once from configuration; the provider never
 * branches on the model id string.
 */

import { ConfigurationError } from '../../errors/index.js';
import type { ModelRequestBody } from '../../providers/bedrock.js';

export const TITAN_V1_MODEL = 'amazon.titan-embed-text-v1';
export const TITAN_V2_MODEL = 'amazon.titan-embed-text-v2:0';

export const TITAN_V1_DIMENSIONS = 1536;
export const TITAN_V2_DIMENSIONS = [256, 512, 1024] as const;
export const TITAN_V2_DEFAULT_DIMENSIONS = 1024;

export type TitanV2Dimensions = (typeof TITAN_V2_DIMENSIONS)[number];

export type EmbeddingModelSpec =
  | { kind: 'titan-v1'; modelId: string; dimensions: typeof TITAN_V1_DIMENSIONS }
  | { kind: 'titan-v2'; modelId: string; dimensions: TitanV2Dimensions; normalize: boolean };

export interface ModelSettings {
  /** Requested output size; only Titan v2 accepts anything but its default */
  dimensions?: number;
  normalize: boolean;
}

/**
 * True for every Titan v1 model id (fixed 1536-dimensional output).
 */
export function isTitanV1(modelId: string): boolean {
  return modelId.startsWith(TITAN_V1_MODEL);
}

function isTitanV2Dimensions(value: number): value is TitanV2Dimensions {
  return TITAN_V2_DIMENSIONS.some((allowed) => allowed === value);
}

/**
 * Resolve a Bedrock model id to its variant.
 *
 * @throws ConfigurationError for unknown models or unsupported dimensions
 *
 * @example
 * ```typescript
 * resolveEmbeddingModel('amazon.titan-embed-text-v2:0', { dimensions: 512, normalize: true });
 * // { kind: 'titan-v2', modelId: 'amazon.titan-embed-text-v2:0', dimensions: 512, normalize: true }
 * ```
 */
export function resolveEmbeddingModel(modelId: string, settings: ModelSettings): EmbeddingModelSpec {
  if (isTitanV1(modelId)) {
    if (settings.dimensions !== undefined && settings.dimensions !== TITAN_V1_DIMENSIONS) {
      throw new ConfigurationError(
        `${modelId} always produces ${TITAN_V1_DIMENSIONS}-dimensional vectors (got dimensions = ${settings.dimensions})`,
        'Remove embedding.dimensions or switch to amazon.titan-embed-text-v2:0'
      );
    }
    return { kind: 'titan-v1', modelId, dimensions: TITAN_V1_DIMENSIONS };
  }

  if (modelId.startsWith('amazon.titan-embed-text-v2')) {
    const dimensions = settings.dimensions ?? TITAN_V2_DEFAULT_DIMENSIONS;
    if (!isTitanV2Dimensions(dimensions)) {
      throw new ConfigurationError(
        `${modelId} does not support ${dimensions} dimensions`,
        `Set embedding.dimensions to one of: ${TITAN_V2_DIMENSIONS.join(', ')}`
      );
    }
    return { kind: 'titan-v2', modelId, dimensions, normalize: settings.normalize };
  }

  throw new ConfigurationError(
    `Unsupported embedding model: ${modelId}`,
    `Use ${TITAN_V1_MODEL} or ${TITAN_V2_MODEL}`
  );
}

/**
 * Build the InvokeModel body for one text.
 */
export function buildEmbeddingRequest(spec: EmbeddingModelSpec, text: string): ModelRequestBody {
  switch (spec.kind) {
    case 'titan-v1':
      return { inputText: text };
    case 'titan-v2':
      return { inputText: text, dimensions: spec.dimensions, normalize: spec.normalize };
  }
}

/**
 * Expected vector size for a model id.
 *
 * @throws ConfigurationError for unknown models
 */
export function getModelDimensions(modelId: string, dimensions?: number): number {
  return resolveEmbeddingModel(modelId, { dimensions, normalize: true }).dimensions;
}
