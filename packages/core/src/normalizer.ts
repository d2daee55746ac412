const COMBINING_MARKS = /\p{Mn}/gu;

/** Drops diacritics but keeps case: "Ági" -> "Agi". Used for output filenames. */
export const stripAccents = (text: string): string => text.normalize("NFD").replace(COMBINING_MARKS, "");

/** Grouping equivalence: "Ági", "Agi" and "AGI" all fold to "agi". */
export const foldKey = (text: string): string => stripAccents(text).toLowerCase();
