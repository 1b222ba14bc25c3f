import { InferenceClient } from "@huggingface/inference";
import { logger, withTimeout, type Logger } from "@mindease/shared";
import type { ScoredEmotion, TextClassifier } from "../types/index.js";

export interface ModelClassifierOptions {
  accessToken: string;
  /** Hosted text-classification model, e.g. an emotion fine-tune. */
  model: string;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Emotion classifier backed by a hosted text-classification model.
 *
 * The inference client is created on the first `classify` call and reused
 * afterwards.
 */
export class ModelEmotionClassifier implements TextClassifier {
  readonly method = "model" as const;

  private client: InferenceClient | undefined;
  private readonly log: Logger;

  constructor(private readonly options: ModelClassifierOptions) {
    this.log =
      options.logger ?? logger.child({ service: "emotion-model" });
  }

  get initialized(): boolean {
    return this.client !== undefined;
  }

  private getClient(): InferenceClient {
    if (!this.client) {
      this.client = new InferenceClient(this.options.accessToken);
      this.log.info("Emotion model client initialized", {
        model: this.options.model,
      });
    }
    return this.client;
  }

  /**
   * Returns every label the model produced, lower-cased and ranked by score.
   */
  async classify(text: string): Promise<ScoredEmotion[]> {
    const output = await withTimeout(
      this.getClient().textClassification({
        model: this.options.model,
        inputs: text,
      }),
      this.options.timeoutMs,
      "emotion-model",
    );

    return output
      .map((prediction) => ({
        emotion: prediction.label.toLowerCase(),
        confidence: prediction.score,
      }))
      .sort((a, b) => b.confidence - a.confidence);
  }
}
