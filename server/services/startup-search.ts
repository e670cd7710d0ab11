import type {
  ChatMessage,
  LlmConfig,
  RankedStartup,
  RecommendResponse,
  SearchFilters,
  SearchMode,
  StartupCombination,
  StartupRecord
} from "../domain/types.js";
import { buildRecommendationMessages } from "../llm/prompts.js";
import { extractIntent, parseNeedFilters } from "./need-analysis.js";
import { combineForNeed, matchNeed, type MatchOptions, type ZeroMatchPolicy } from "./need-matcher.js";

export interface StartupSource {
  getStartups(): Promise<StartupRecord[]>;
}

export interface Retriever {
  retrieve(need: string, records: StartupRecord[], topK?: number, options?: MatchOptions): Promise<RankedStartup[]>;
}

export interface ChatClient {
  chat(messages: ChatMessage[], config: LlmConfig): Promise<string>;
}

export interface StartupSearchServiceOptions {
  data: StartupSource;
  retriever: Retriever;
  llm: ChatClient;
  llmConfig: LlmConfig;
  zeroMatchPolicy?: ZeroMatchPolicy;
  random?: () => number;
}

export interface SearchRequest {
  need: string;
  topK?: number;
  filters?: SearchFilters;
  mode?: SearchMode;
}

export interface CombineRequest {
  need: string;
  topK?: number;
  filters?: SearchFilters;
}

export const NO_MATCH_ANSWER = "Aucune startup de l'annuaire ne correspond à ce besoin pour le moment.";

export class StartupSearchService {
  constructor(private readonly options: StartupSearchServiceOptions) {}

  async search(request: SearchRequest): Promise<RankedStartup[]> {
    const records = await this.options.data.getStartups();
    const topK = request.topK ?? 5;
    const matchOptions = this.matchOptions(request.filters);

    if (request.mode === "semantic") {
      return this.options.retriever.retrieve(request.need, records, topK, matchOptions);
    }
    return matchNeed(request.need, records, topK, matchOptions);
  }

  async combine(request: CombineRequest): Promise<StartupCombination[]> {
    const records = await this.options.data.getStartups();
    return combineForNeed(request.need, records, request.topK ?? 3, this.matchOptions(request.filters));
  }

  /** Inline filters are lifted out of the need, then matches and pairs are summarized by the LLM. */
  async recommend(request: { need: string; topK?: number }): Promise<RecommendResponse> {
    const intent = extractIntent(request.need);
    const { need, filters } = parseNeedFilters(request.need);
    const topK = request.topK ?? 5;

    const records = await this.options.data.getStartups();
    const matchOptions = this.matchOptions(filters);
    const matches = await this.options.retriever.retrieve(need, records, topK, matchOptions);
    const combinations = intent === "combine" ? combineForNeed(need, records, 3, matchOptions) : [];

    const answer =
      matches.length === 0
        ? NO_MATCH_ANSWER
        : await this.options.llm.chat(buildRecommendationMessages(need, matches, combinations), this.options.llmConfig);

    return { intent, need, filters, matches, combinations, answer };
  }

  private matchOptions(filters?: SearchFilters): MatchOptions {
    return { filters, zeroMatchPolicy: this.options.zeroMatchPolicy, random: this.options.random };
  }
}
