/**
 * Keyword sets used to classify a record set as local (suburban) or
 * non-local (long-distance/express). Matched case-insensitively as
 * substrings of the train name or type.
 */
export interface TrainCategoryKeywords {
    nonLocal: readonly string[];
    local: readonly string[];
}

export const NON_LOCAL_KEYWORDS: readonly string[] = [
    "express",
    "rajdhani",
    "shatabdi",
    "duronto",
    "garib rath",
    "superfast",
    "super fast",
    "fast",
    "mail",
    "special",
];

export const LOCAL_KEYWORDS: readonly string[] = [
    "local",
    "suburban",
    "passenger",
    "memu",
    "dmu",
    "emu",
];

export const DEFAULT_TRAIN_CATEGORIES: TrainCategoryKeywords = {
    nonLocal: NON_LOCAL_KEYWORDS,
    local: LOCAL_KEYWORDS,
};

export const DEFAULT_SELECTION_LIMIT = 3;
export const DEFAULT_LOCAL_WINDOW_MINUTES = 60;
