import type { PipelineContext, Summary, Transcript } from '../types/media.js';
import { targetPair } from '../types/media.js';
import type { SummarizationProvider } from '../types/summarization.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { errorMessage } from '../errors.js';
import { withPolicy, type RetryPolicyOptions } from './policy.js';
import { buildSummaryPrompt, type PromptTemplates } from './prompts.js';

export const EMPTY_SUMMARY_TEXT = 'The model returned an empty summary.';

export class SummarizationOrchestrator {
  constructor(
    private readonly providers: ProviderRegistry<SummarizationProvider>,
    private readonly defaultProviderId: string,
    private readonly prompts: PromptTemplates,
    private readonly retry: Omit<RetryPolicyOptions, 'label'>
  ) {}

  /** The user's choice when it is registered, else the configured default. */
  resolveProvider(context: PipelineContext = {}): SummarizationProvider | undefined {
    const preferred = context.summarizerId ? this.providers.get(context.summarizerId) : undefined;
    return preferred ?? this.providers.get(this.defaultProviderId);
  }

  /**
   * Never throws: a provider failure becomes a visible error text so the
   * already delivered transcript is not held back.
   */
  async summarize(transcript: Transcript, context: PipelineContext = {}): Promise<Summary> {
    const provider = this.resolveProvider(context);
    if (!provider) {
      return {
        markupText: 'Summary unavailable: no summarization provider is configured.',
        outcome: 'failed',
        providerId: context.summarizerId ?? this.defaultProviderId,
      };
    }

    const request = buildSummaryPrompt(transcript.text, this.prompts);
    try {
      const text = await withPolicy(
        (target) => provider.summarize(request, target.name),
        targetPair(provider.models.primary, provider.models.fallback),
        { ...this.retry, label: `summary:${provider.id}` }
      );
      const trimmed = text.trim();
      if (!trimmed) {
        return { markupText: EMPTY_SUMMARY_TEXT, outcome: 'empty', providerId: provider.id };
      }
      return { markupText: trimmed, outcome: 'generated', providerId: provider.id };
    } catch (error) {
      console.error(`[Pipeline] Summarization with ${provider.displayName} failed:`, error);
      return {
        markupText: `Summary failed: ${errorMessage(error)}`,
        outcome: 'failed',
        providerId: provider.id,
      };
    }
  }
}
