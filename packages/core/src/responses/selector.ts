import {
  DISTRESS_LABELS,
  describeError,
  logger,
  type EmotionLabel,
  type Logger,
  type Quote,
} from "@mindease/shared";
import type {
  QuoteSource,
  RandomSource,
  ResponseLibrary,
  SupportGenerator,
} from "../types/index.js";
import { RESPONSE_POLICY } from "../config/settings.js";
import { normalizeEmotion } from "../emotion/normalize.js";
import {
  COPING_INTROS,
  QUOTE_PREFIXES,
  TECHNIQUE_LEAD_IN,
} from "./framing.js";
import { defaultRandom, pickOne } from "./random.js";

export interface ResponseSelectorOptions {
  library: ResponseLibrary;
  /** Remote generation; omitted means canned replies only. */
  generator?: SupportGenerator | undefined;
  /** Remote quote service; omitted means offline quotes only. */
  quotes?: QuoteSource | undefined;
  random?: RandomSource;
  logger?: Logger;
}

export interface SupportReplyOptions {
  /** Allow a coping technique after a canned reply for distress emotions. */
  appendTechnique?: boolean;
}

function isDistress(emotion: EmotionLabel): boolean {
  return DISTRESS_LABELS.some((label) => label === emotion);
}

/**
 * Chooses the text sent back to the user. Every method accepts any label
 * string and resolves; remote failures fall back to the local library.
 */
export class ResponseSelector {
  private readonly library: ResponseLibrary;
  private readonly generator: SupportGenerator | undefined;
  private readonly quotes: QuoteSource | undefined;
  private readonly random: RandomSource;
  private readonly log: Logger;

  constructor(options: ResponseSelectorOptions) {
    this.library = options.library;
    this.generator = options.generator;
    this.quotes = options.quotes;
    this.random = options.random ?? defaultRandom;
    this.log = options.logger ?? logger.child({ service: "response-selector" });
  }

  empatheticResponse(label: string): string {
    const emotion = normalizeEmotion(label);
    return pickOne(this.library.empatheticResponses[emotion], this.random);
  }

  copingTechnique(label: string): string {
    const emotion = normalizeEmotion(label);
    return pickOne(this.library.copingTechniques[emotion], this.random);
  }

  async supportReply(
    message: string,
    label: string,
    options: SupportReplyOptions = {},
  ): Promise<string> {
    const emotion = normalizeEmotion(label);

    if (this.random() < RESPONSE_POLICY.predefinedResponseProbability) {
      let reply = this.empatheticResponse(emotion);
      if (
        options.appendTechnique &&
        isDistress(emotion) &&
        this.random() < RESPONSE_POLICY.techniqueProbability
      ) {
        reply += TECHNIQUE_LEAD_IN + this.copingTechnique(emotion);
      }
      return reply;
    }

    if (!this.generator) {
      return this.empatheticResponse(emotion);
    }

    try {
      return await this.generator.generate({ message, emotion });
    } catch (error) {
      this.log.warn("Support generation failed, using canned reply", {
        emotion,
        error: describeError(error),
      });
      return this.empatheticResponse(emotion);
    }
  }

  async motivationalQuote(label: string): Promise<string> {
    const emotion = normalizeEmotion(label);
    const { quote, author } = await this.fetchQuote();
    return `${QUOTE_PREFIXES[emotion]}\n"${quote}"\n- ${author}`;
  }

  copingSuggestion(label: string): string {
    const emotion = normalizeEmotion(label);
    return `${COPING_INTROS[emotion]}\n\n${this.copingTechnique(emotion)}`;
  }

  private async fetchQuote(): Promise<Quote> {
    if (this.quotes) {
      try {
        return await this.quotes.fetchQuote();
      } catch (error) {
        this.log.warn("Quote service unavailable, using offline quote", {
          error: describeError(error),
        });
      }
    }
    return pickOne(this.library.fallbackQuotes, this.random);
  }
}
