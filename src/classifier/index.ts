/**
 * Signal Digest — Structured Classifier
 *
 * One structured-extraction call per item, validated against the
 * response schema. Every failure path ends in the default record, so a
 * batch always yields one complete record per input item, in input order.
 *
 * Without a configured credential the whole batch short-circuits to
 * default records and no call is made.
 */

import type { ClassificationStatus, ClassifiedRecord, IntermediateItem } from '../types';
import type { ClassifierConfig } from '../config';
import { AnthropicTextGenerator, type TextGenerator } from './text-generation';
import { buildSystemPrompt, buildUserPrompt } from './prompt';
import { parseClassificationResponse } from './response';
import { classifiedRecord, defaultRecord } from './record';
import { attempt, mapOutcome, withDefault } from '../lib/outcome';
import { boundedMap } from '../lib/concurrency';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

export { AnthropicTextGenerator } from './text-generation';
export type { TextGenerator, TextGenerationRequest, TextGenerationOptions } from './text-generation';
export { defaultRecord } from './record';
export { extractJsonPayload, parseClassificationResponse } from './response';

// ============================================================
// TYPES
// ============================================================

export interface ClassificationResult {
  record: ClassifiedRecord;
  status: ClassificationStatus;
  reason?: string;
}

export type ClassificationCounts = Record<ClassificationStatus, number>;

export interface ClassificationBatchResult {
  /** One per input item, same order */
  results: ClassificationResult[];
  counts: ClassificationCounts;
}

function emptyCounts(): ClassificationCounts {
  return {
    classified: 0,
    unconfigured: 0,
    transport_failure: 0,
    schema_failure: 0,
    skipped: 0,
  };
}

// ============================================================
// CLASSIFIER
// ============================================================

export class StructuredClassifier {
  private readonly log = logger.child({ component: 'classifier' });
  private readonly generator: TextGenerator | null;

  /**
   * @param generator - Transport override; defaults to the Anthropic API
   *   when a credential is configured.
   */
  constructor(
    private readonly config: ClassifierConfig,
    generator?: TextGenerator
  ) {
    this.generator = config.apiKey
      ? generator ?? new AnthropicTextGenerator(config.apiKey)
      : null;
  }

  get isConfigured(): boolean {
    return this.generator !== null;
  }

  async classify(item: IntermediateItem, signal?: AbortSignal): Promise<ClassificationResult> {
    if (!this.generator) {
      return { record: defaultRecord(item), status: 'unconfigured' };
    }

    const generator = this.generator;
    const response = await attempt(() =>
      generator.generate(
        {
          model: this.config.model,
          system: buildSystemPrompt(),
          prompt: buildUserPrompt(item),
          maxTokens: this.config.maxTokens,
        },
        { timeoutMs: this.config.timeoutMs, signal }
      )
    );

    const fromText = (text: string): ClassificationResult =>
      withDefault(
        mapOutcome(
          parseClassificationResponse(text),
          (value): ClassificationResult => ({ record: classifiedRecord(item, value), status: 'classified' })
        ),
        reason => this.fallback(item, 'schema_failure', reason)
      );

    return withDefault(mapOutcome(response, fromText), reason =>
      this.fallback(item, 'transport_failure', reason)
    );
  }

  private fallback(
    item: IntermediateItem,
    status: 'transport_failure' | 'schema_failure',
    reason: string
  ): ClassificationResult {
    this.log.warn(
      status === 'transport_failure' ? 'Classification call failed' : 'Classification response rejected',
      { identity: item.identity, error: reason }
    );
    return { record: defaultRecord(item), status, reason };
  }

  /**
   * Classify a batch behind the classification gate.
   */
  async classifyBatch(
    items: readonly IntermediateItem[],
    signal?: AbortSignal
  ): Promise<ClassificationBatchResult> {
    if (!this.generator) {
      this.log.warn('ANTHROPIC_API_KEY not set, storing default records', { items: items.length });
      const results = items.map(
        (item): ClassificationResult => ({ record: defaultRecord(item), status: 'unconfigured' })
      );
      return { results, counts: { ...emptyCounts(), unconfigured: results.length } };
    }

    const results = await boundedMap(items, item => this.classify(item, signal), {
      concurrency: this.config.concurrency,
      signal,
      recover: (item, _index, reason): ClassificationResult =>
        reason.kind === 'cancelled'
          ? { record: defaultRecord(item), status: 'skipped', reason: 'cancelled' }
          : { record: defaultRecord(item), status: 'transport_failure', reason: errorMessage(reason.error) },
    });

    const counts = emptyCounts();
    for (const result of results) {
      counts[result.status]++;
    }

    this.log.info('Batch classification completed', { total: items.length, ...counts });

    return { results, counts };
  }
}
