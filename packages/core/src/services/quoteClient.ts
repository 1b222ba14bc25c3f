import { ExternalServiceError, quoteSchema } from "@mindease/shared";
import type { QuoteSource } from "../types/index.js";
import { fetchOnce } from "./http.js";

const SERVICE = "quote-api";

export interface QuoteClientOptions {
  url: string;
  timeoutMs: number;
}

/**
 * Client for the local quote service. Anything but a 200 carrying
 * `{ quote, author }` is an error.
 */
export function createQuoteClient(options: QuoteClientOptions): QuoteSource {
  return {
    async fetchQuote() {
      return fetchOnce(
        options.url,
        {
          service: SERVICE,
          timeoutMs: options.timeoutMs,
          init: { headers: { Accept: "application/json" } },
        },
        async (response) => {
          if (response.status !== 200) {
            await response.body?.cancel();
            throw new ExternalServiceError(
              SERVICE,
              `Quote API returned status ${response.status}`,
              { upstreamStatus: response.status },
            );
          }

          const parsed = quoteSchema.safeParse(await response.json());
          if (!parsed.success) {
            throw new ExternalServiceError(
              SERVICE,
              "Quote API returned an unexpected body",
            );
          }
          return parsed.data;
        },
      );
    },
  };
}
