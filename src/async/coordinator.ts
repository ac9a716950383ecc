import type { ChatBackend, ModelId } from "../ai/backend.js";
import { EmptyInputError, getErrorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { SerialExecutor } from "./executor.js";

export type RequestState =
  | { kind: "idle" }
  | { kind: "processing" }
  | { kind: "error"; message: string };

export type PendingResponse = { content: string; error: string | null };

export type SubmitResult = "submitted" | "empty" | "busy";

/**
 * The only state shared between the foreground and the worker. It is read
 * and written in synchronous sections only; nothing holds it across the
 * network await.
 */
class RequestSlot {
  state: RequestState = { kind: "idle" };
  pending: PendingResponse | null = null;
  needsCheck = false;

  publish(response: PendingResponse, state: RequestState) {
    this.pending = response;
    this.state = state;
    this.needsCheck = true;
  }
}

export function formatAssistantReply(reply: string) {
  return `\n\nAssistant\n ${reply}`;
}

export type CoordinatorOptions = {
  executor?: SerialExecutor;
  formatResponse?: (reply: string) => string;
};

/**
 * Hands editor content to a background worker and publishes the reply back
 * for the render loop to consume. One request may be in flight; submitting
 * while one is processing is rejected.
 */
export class RequestCoordinator {
  private readonly slot = new RequestSlot();
  private readonly executor: SerialExecutor;
  private readonly formatResponse: (reply: string) => string;

  constructor(
    private readonly backend: ChatBackend,
    options: CoordinatorOptions = {},
  ) {
    this.executor = options.executor ?? new SerialExecutor();
    this.formatResponse = options.formatResponse ?? formatAssistantReply;
  }

  submit(content: string, model: ModelId): SubmitResult {
    if (this.slot.state.kind === "processing") return "busy";
    if (content.length === 0) {
      this.slot.state = { kind: "error", message: new EmptyInputError().message };
      return "empty";
    }

    this.slot.state = { kind: "processing" };
    logger.info("Submitting AI request", { model, chars: content.length });

    // the worker only sees immutable inputs: the content snapshot and model
    const backend = this.backend;
    const slot = this.slot;
    const format = this.formatResponse;
    this.executor.spawn(async () => {
      try {
        const reply = await backend.send(content, model);
        slot.publish({ content: format(reply), error: null }, { kind: "idle" });
      } catch (error) {
        const message = getErrorMessage(error);
        logger.error("AI request failed", { model, error: message });
        slot.publish({ content: "", error: message }, { kind: "error", message });
      }
    });
    return "submitted";
  }

  state(): RequestState {
    return this.slot.state;
  }

  get needsCheck() {
    return this.slot.needsCheck;
  }

  /**
   * Takes the published response, if any, and clears the needs-check flag.
   * A response is handed out at most once.
   */
  take(): PendingResponse | null {
    if (!this.slot.needsCheck) return null;
    const response = this.slot.pending;
    this.slot.pending = null;
    this.slot.needsCheck = false;
    return response;
  }

  /** Resolves once the in-flight request, if any, has settled. */
  settled(): Promise<void> {
    return this.executor.idle();
  }
}
