/**
 * Token Accountant
 * Counts tokens per model and splits the model's context window into the
 * response reservation and what is left for directive, history and the new message
 */

import { BudgetExceededError } from '../errors.js';
import { contextWindowFor } from '../models.js';
import type { ModelParameters, PromptBudget } from '../types/index.js';
import type { Tokenizer } from '../utils/token-counter.js';

export interface TokenAccountantOptions {
  tokenizer: Tokenizer;
  /** Framing tokens the chat format adds to every message */
  messageOverhead: number;
  /** Share of the context window reserved for the reply when maxTokens is unset */
  responseReservePct: number;
  safetyMarginPct: number;
}

export class TokenAccountant {
  constructor(private readonly options: TokenAccountantOptions) {}

  countTokens(text: string, model: string): number {
    return this.options.tokenizer.count(text, model);
  }

  countMessage(content: string, model: string): number {
    return this.countTokens(content, model) + this.options.messageOverhead;
  }

  /**
   * Budget for one request. `newMessageTokens` is the cost of the incoming
   * user message; together with the directive it must fit, or the request is refused.
   */
  budgetFor(parameters: ModelParameters, newMessageTokens: number = 0): PromptBudget {
    const maxTotalTokens = parameters.contextWindow ?? contextWindowFor(parameters.model);
    const reservedForResponse =
      parameters.maxTokens ?? Math.floor(maxTotalTokens * this.options.responseReservePct / 100);
    const safetyMargin = Math.floor(maxTotalTokens * this.options.safetyMarginPct / 100);
    const availableForContext = Math.max(maxTotalTokens - reservedForResponse - safetyMargin, 0);

    const directiveTokens = this.countMessage(parameters.systemDirective, parameters.model);
    const mandatoryTokens = directiveTokens + newMessageTokens;

    if (mandatoryTokens > availableForContext) {
      throw new BudgetExceededError(mandatoryTokens, availableForContext);
    }

    return { maxTotalTokens, reservedForResponse, availableForContext, mandatoryTokens };
  }
}
