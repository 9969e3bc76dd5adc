export interface QueryIntent {
  identity: boolean;
  infoSeeking: boolean;
  price: boolean;
  count: boolean;
  industry: boolean;
}

export type QueryRoute = "identity" | "count_industry" | "price" | "generic" | "chat";

/** Lowercase substring markers, Danish and English, per intent flag. */
export const INTENT_KEYWORDS = {
  identity: ["hvem er du", "hvad hedder du", "what's your name", "what is your name", "who are you"],
  infoSeeking: [
    "price",
    "pricing",
    "pakke",
    "package",
    "service",
    "policy",
    "politik",
    "proces",
    "process",
    "procedure",
    "how",
    "what",
    "where",
    "hvad",
    "hvordan",
    "hvor",
    "cost",
    "pris",
    "priser",
    "timeline",
    "tidslinje",
    "find",
    "show",
    "tell me",
    "forklar",
    "vis",
  ],
  price: [
    "pris",
    "priser",
    "price",
    "pricing",
    "pakke",
    "pakker",
    "package",
    "packages",
    "abonnement",
    "abonnements",
    "gebyr",
    "fee",
    "fees",
    "cost",
    "costs",
    "koster",
    "hvad koster",
  ],
  count: ["how many", "hvor mange", "antal", "number of", "count"],
  industry: ["branche", "brancher", "industri", "industrier", "industries", "sektor", "sektorer"],
} as const satisfies Record<keyof QueryIntent, readonly string[]>;

function containsAny(textLower: string, markers: readonly string[]): boolean {
  return markers.some((marker) => textLower.includes(marker));
}

export function isIdentityQuestion(text: string): boolean {
  return containsAny(text.toLowerCase().trim(), INTENT_KEYWORDS.identity);
}

export function isInfoSeeking(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.includes("?") || containsAny(lower, INTENT_KEYWORDS.infoSeeking);
}

export function isPriceQuery(text: string): boolean {
  return containsAny(text.toLowerCase(), INTENT_KEYWORDS.price);
}

export function isCountQuery(text: string): boolean {
  return containsAny(text.toLowerCase(), INTENT_KEYWORDS.count);
}

export function isIndustryQuery(text: string): boolean {
  return containsAny(text.toLowerCase(), INTENT_KEYWORDS.industry);
}

export function classifyIntent(text: string): QueryIntent {
  return {
    identity: isIdentityQuestion(text),
    infoSeeking: isInfoSeeking(text),
    price: isPriceQuery(text),
    count: isCountQuery(text),
    industry: isIndustryQuery(text),
  };
}

/**
 * Picks the retrieval path. Precedence: identity, industry count, price,
 * generic lookup; anything not info-seeking is plain chat.
 */
export function resolveRoute(intent: QueryIntent): QueryRoute {
  if (intent.identity) {
    return "identity";
  }
  if (!intent.infoSeeking) {
    return "chat";
  }
  if (intent.count && intent.industry) {
    return "count_industry";
  }
  if (intent.price) {
    return "price";
  }
  return "generic";
}
