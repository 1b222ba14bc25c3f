import type { BotResponse } from "./protocol.js";

/**
 * Collects the messages an action sends back to the user during one turn.
 */
export class CollectingDispatcher {
  private readonly collected: BotResponse[] = [];

  utterMessage(text: string): void {
    this.collected.push({ text });
  }

  get responses(): readonly BotResponse[] {
    return this.collected;
  }
}
