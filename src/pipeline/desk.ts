import { validateSignals } from "../agents/researchers";
import { validatePortfolio } from "../agents/risk-manager";
import type { AnalystSignals, Decision, Portfolio } from "../agents/types";
import { readEnv, type Env } from "../env";
import type { AgentType } from "../lib/agents/protocol";
import { createError, ErrorCode, isPreconditionError } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import { mergeDeskConfigWithDefaults, type DeskConfig, type DeskConfigOverrides } from "../policy/config";
import { createCompletionClient, type CompletionClient } from "../providers/llm/completion-client";
import { createLLMProvider } from "../providers/llm/factory";
import type { LLMProvider, MarketDataProvider } from "../providers/types";
import { createRunContext, withStage, type RunContext } from "./run-context";
import { DECISION_STAGES, SIGNAL_STAGES, STAGES, type StageDeps } from "./stages";

export interface AnalyzeRequest {
  ticker: string;
  startDate: string;
  endDate: string;
  portfolio: Portfolio;
}

export interface RunRequest extends AnalyzeRequest {
  signals: AnalystSignals;
}

export interface TradingDeskOptions {
  market: MarketDataProvider;
  /** Takes precedence over `llm`. */
  client?: CompletionClient;
  /** `null` runs without a completion service; omitted, one is built from `env`. */
  llm?: LLMProvider | null;
  config?: DeskConfigOverrides;
  env?: Env;
  logger?: Logger;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

function validateRequest(request: AnalyzeRequest): void {
  if (typeof request.ticker !== "string" || request.ticker.trim().length === 0) {
    throw createError(ErrorCode.INVALID_INPUT, "ticker is required");
  }
  for (const [name, value] of [
    ["startDate", request.startDate],
    ["endDate", request.endDate],
  ] as const) {
    if (!ISO_DATE.test(value) || Number.isNaN(Date.parse(value))) {
      throw createError(ErrorCode.INVALID_INPUT, `${name} must be an ISO date`, { [name]: value });
    }
  }
  if (request.startDate > request.endDate) {
    throw createError(ErrorCode.INVALID_INPUT, "startDate must not be after endDate", {
      startDate: request.startDate,
      endDate: request.endDate,
    });
  }
  validatePortfolio(request.portfolio);
}

/**
 * Runs one ticker through debate, risk and decision stages in a fixed order.
 * Holds no per-run state, so one desk may serve concurrent runs for
 * different tickers; runs against the same portfolio are the caller's to
 * serialize.
 */
export class TradingDesk {
  readonly config: DeskConfig;
  private readonly logger: Logger;
  private readonly deps: StageDeps;

  constructor(options: TradingDeskOptions) {
    const env = options.env ?? {};
    this.config = mergeDeskConfigWithDefaults(options.config, env);
    this.logger = options.logger ?? createLogger("desk", this.config.logLevel);

    const client =
      options.client ??
      createCompletionClient(
        options.llm === undefined ? createLLMProvider(env, this.logger.child("llm")) : options.llm,
        { policy: this.config.llm, logger: this.logger.child("completion") }
      );

    this.deps = {
      client,
      config: this.config,
      logger: this.logger,
      market: options.market,
    };
  }

  static fromEnv(market: MarketDataProvider, env: Env = readEnv()): TradingDesk {
    return new TradingDesk({ market, env });
  }

  /** Decision from caller-supplied analyst signals. */
  async run(request: RunRequest): Promise<Decision> {
    return this.decisionOf(await this.runWithTrace(request));
  }

  /** Decision with the four analyst signals produced from the market feed first. */
  async analyze(request: AnalyzeRequest): Promise<Decision> {
    return this.decisionOf(await this.analyzeWithTrace(request));
  }

  async runWithTrace(request: RunRequest): Promise<RunContext> {
    validateRequest(request);
    validateSignals(request.signals);
    const context = await this.openContext(request, request.signals);
    return this.execute(context, DECISION_STAGES);
  }

  async analyzeWithTrace(request: AnalyzeRequest): Promise<RunContext> {
    validateRequest(request);
    const context = await this.openContext(request);
    return this.execute(context, [...SIGNAL_STAGES, ...DECISION_STAGES]);
  }

  private async openContext(request: AnalyzeRequest, signals?: AnalystSignals): Promise<RunContext> {
    const ticker = request.ticker.trim().toUpperCase();
    const range = { start: request.startDate, end: request.endDate };
    const bars = await this.deps.market.getPriceHistory(ticker, range);
    if (bars.length === 0) {
      throw createError(ErrorCode.MISSING_PRECONDITION, `No price history for ${ticker}`, { ...range });
    }
    return createRunContext({ ticker, range, portfolio: request.portfolio, bars, signals });
  }

  private async execute(initial: RunContext, stages: readonly AgentType[]): Promise<RunContext> {
    let context = initial;
    this.logger.info("Run started", { runId: context.runId, ticker: context.ticker, asOf: context.asOf });

    for (const stage of stages) {
      const startedAt = Date.now();
      try {
        const { result, note } = await STAGES[stage](context, this.deps);
        context = withStage(context, result, { stage, startedAt, durationMs: Date.now() - startedAt, note });
      } catch (error) {
        const meta = { runId: context.runId, ticker: context.ticker };
        if (isPreconditionError(error)) {
          this.logger.warn(`Stage ${stage} precondition failed; run aborted`, {
            ...meta,
            code: error.code,
            message: error.message,
          });
        } else {
          this.logger.error(`Stage ${stage} failed; run aborted`, error, meta);
        }
        throw error;
      }
    }

    this.logger.info("Run finished", {
      runId: context.runId,
      ticker: context.ticker,
      action: context.decision?.action,
      quantity: context.decision?.quantity,
    });
    return context;
  }

  private decisionOf(context: RunContext): Decision {
    if (!context.decision) {
      throw createError(ErrorCode.INTERNAL_ERROR, "Run finished without a decision", { runId: context.runId });
    }
    return context.decision;
  }
}
