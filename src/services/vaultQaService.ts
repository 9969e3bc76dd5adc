import { SessionKey, SessionStore } from "../domain/sessionStore.js";
import { ConversationTurn, Section, Snippet } from "../domain/types.js";
import { AnswerGenerator, GenerationResult } from "../infra/ai/types.js";
import { BuildResult, VaultIndex } from "../infra/vault/vaultIndex.js";
import {
  IDENTITY_LINE,
  NO_INFO_LINE,
  SOURCES_HEADER,
  SOURCES_REMINDER,
  buildPriceSnippets,
  buildSnippetsFromSections,
  buildSystemPrompt,
  ensureSources,
} from "../pipelines/answering.js";
import { extractInclusionSnippets } from "../pipelines/inclusion.js";
import { buildIndustryCountSnippets } from "../pipelines/industryCount.js";
import { QueryRoute, classifyIntent, resolveRoute } from "../pipelines/intent.js";
import { extractPriceItems, filterPriceItems } from "../pipelines/priceExtraction.js";
import { Logger, noopLogger } from "../utils/logger.js";
import { extractQueryTerms } from "../utils/text.js";

export interface VaultQaServiceOptions {
  maxSnippets: number;
  requestTimeoutMs: number;
  logger?: Logger;
}

export interface QueryInput extends SessionKey {
  text: string;
}

export type QueryOutcome =
  | "empty"
  | "identity"
  | "no_info"
  | "generation_failed"
  | "answered";

export interface QueryResult {
  reply: string;
  route: QueryRoute | null;
  outcome: QueryOutcome;
  snippets: Snippet[];
  sources: string[];
}

interface Retrieval {
  snippets: Snippet[];
  priceQuery: boolean;
}

const TOP_PRICE_PATHS = 2;
const PRICE_CANDIDATE_FACTOR = 4;

/**
 * Per-request pipeline: classify the query, pull supporting material from
 * the vault, ask the answer generator, make sure the answer cites its
 * sources, and record the exchange in the session store.
 */
export class VaultQaService {
  private readonly logger: Logger;

  constructor(
    private readonly index: VaultIndex,
    private readonly generator: AnswerGenerator,
    private readonly sessions: SessionStore,
    private readonly options: VaultQaServiceOptions,
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  async query(input: QueryInput): Promise<QueryResult> {
    const text = input.text.trim();
    if (!text) {
      return { reply: "", route: null, outcome: "empty", snippets: [], sources: [] };
    }

    const intent = classifyIntent(text);
    const route = resolveRoute(intent);
    this.logger.debug(`query route=${route} user=${input.userId} channel=${input.channelId}`);

    if (route === "identity") {
      await this.appendHistory(input, text, IDENTITY_LINE);
      return { reply: IDENTITY_LINE, route, outcome: "identity", snippets: [], sources: [] };
    }

    let retrieval: Retrieval = { snippets: [], priceQuery: intent.price };
    if (route !== "chat") {
      await this.ensureIndexBuilt();
      const retrieved = this.retrieve(route, text, intent.price);
      if (!retrieved) {
        this.logger.debug(`no vault material for route=${route}`);
        await this.appendHistory(input, text, NO_INFO_LINE);
        return { reply: NO_INFO_LINE, route, outcome: "no_info", snippets: [], sources: [] };
      }
      retrieval = retrieved;
    }

    const history = await this.sessions.getSession(input);
    const conversation: ConversationTurn[] = [...history, { role: "user", content: text }];
    const systemPrompt = buildSystemPrompt(route !== "chat", retrieval.priceQuery);

    const first = await this.generate(systemPrompt, conversation, retrieval.snippets);
    if (!first.ok) {
      const reply = `Answer generation failed (${first.kind}): ${first.message}`;
      this.logger.warn(reply);
      await this.appendHistory(input, text, reply);
      return { reply, route, outcome: "generation_failed", snippets: retrieval.snippets, sources: [] };
    }

    if (route === "chat") {
      await this.appendHistory(input, text, first.text);
      return { reply: first.text, route, outcome: "answered", snippets: [], sources: [] };
    }

    if (first.text.trim() === NO_INFO_LINE) {
      await this.appendHistory(input, text, first.text);
      return { reply: first.text, route, outcome: "no_info", snippets: retrieval.snippets, sources: [] };
    }

    let answer = first.text;
    if (!answer.includes(SOURCES_HEADER)) {
      this.logger.debug("answer lacks a Sources block; regenerating once");
      const retry = await this.generate(
        systemPrompt + SOURCES_REMINDER,
        conversation,
        retrieval.snippets,
      );
      if (retry.ok) {
        answer = retry.text;
      } else {
        this.logger.warn(`regeneration failed (${retry.kind}): ${retry.message}`);
      }
    }

    const { response, sources } = ensureSources(answer, retrieval.snippets);
    await this.sessions.setSources(input, sources);
    await this.appendHistory(input, text, response);
    return { reply: response, route, outcome: "answered", snippets: retrieval.snippets, sources };
  }

  async getSources(key: SessionKey): Promise<string[]> {
    return this.sessions.getSources(key);
  }

  async rebuildIndex(): Promise<BuildResult> {
    const result = await this.index.build();
    this.logger.info(
      `vault index built: ${result.note_count} notes, ${result.section_count} sections`,
    );
    return result;
  }

  private async ensureIndexBuilt(): Promise<void> {
    if (this.index.sectionCount === 0 && this.index.vaultRoot) {
      await this.rebuildIndex();
    }
  }

  private retrieve(route: QueryRoute, text: string, priceQuery: boolean): Retrieval | null {
    switch (route) {
      case "count_industry": {
        const snippets = buildIndustryCountSnippets(this.index.snapshot());
        return snippets.length > 0 ? { snippets, priceQuery } : null;
      }
      case "price":
        return this.retrievePrices(text);
      case "generic": {
        const aliasPaths = this.index.findPathsByAlias(text);
        const sections =
          aliasPaths.length > 0
            ? this.index.rankSections(
                this.index.sectionsForPaths(aliasPaths),
                text,
                this.options.maxSnippets,
              )
            : this.index.findSections(text, this.options.maxSnippets);
        return sections.length > 0
          ? { snippets: buildSnippetsFromSections(sections), priceQuery: false }
          : null;
      }
      default:
        return { snippets: [], priceQuery: false };
    }
  }

  // Falls back to "included/free" lines when the candidates list no prices.
  private retrievePrices(text: string): Retrieval | null {
    const { sections, aliasMatched } = this.priceCandidateSections(text);
    if (sections.length === 0) {
      return null;
    }

    let items = extractPriceItems(sections);
    if (items.length > 0 && !aliasMatched) {
      items = filterPriceItems(items, text);
    }
    if (items.length > 0) {
      return { snippets: buildPriceSnippets(items), priceQuery: true };
    }

    const inclusion = extractInclusionSnippets(sections, text);
    return inclusion.length > 0 ? { snippets: inclusion, priceQuery: false } : null;
  }

  private priceCandidateSections(text: string): { sections: Section[]; aliasMatched: boolean } {
    const aliasPaths = this.index.findPathsByAlias(text);
    if (aliasPaths.length > 0) {
      return { sections: this.index.sectionsForPaths(aliasPaths), aliasMatched: true };
    }

    const reduced = extractQueryTerms(text).join(" ") || text;
    const scored = this.index.findSections(
      reduced,
      this.options.maxSnippets * PRICE_CANDIDATE_FACTOR,
    );
    if (scored.length === 0) {
      return { sections: [], aliasMatched: false };
    }
    const expanded = this.index.sectionsForPaths(selectTopPaths(scored, TOP_PRICE_PATHS));
    return { sections: expanded.length > 0 ? expanded : scored, aliasMatched: false };
  }

  private async generate(
    systemPrompt: string,
    conversation: ConversationTurn[],
    snippets: Snippet[],
  ): Promise<GenerationResult> {
    try {
      return await this.generator.generate({
        systemPrompt,
        conversation,
        snippets,
        timeoutMs: this.options.requestTimeoutMs,
      });
    } catch (error) {
      this.logger.error(`${this.generator.backend} generator threw`, error);
      return {
        ok: false,
        kind: "unavailable",
        message: error instanceof Error ? error.message : "unknown error",
      };
    }
  }

  private async appendHistory(key: SessionKey, userText: string, reply: string): Promise<void> {
    const history = await this.sessions.getSession(key);
    history.push({ role: "user", content: userText }, { role: "assistant", content: reply });
    await this.sessions.updateSession(key, history);
  }
}

/** Paths ranked by the summed score of their matching sections. */
export function selectTopPaths(sections: readonly Section[], limit: number): string[] {
  const totals = new Map<string, number>();
  for (const section of sections) {
    totals.set(section.path, (totals.get(section.path) ?? 0) + section.score);
  }
  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([notePath]) => notePath);
}
