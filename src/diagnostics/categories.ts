import type { ErrorCategory } from "./types.js";

export type MatchedCategory = Exclude<ErrorCategory, "other">;

export interface CategoryRule {
  category: MatchedCategory;
  label: string;
  /** Position in the remediation order, 1 = fix first. */
  priority: number;
  matches(line: string): boolean;
  hint: string;
}

export const ERROR_MARKER = "error:";
export const WARNING_MARKER = "warning:";

export const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  syntax: "Syntax errors",
  "optional-chaining": "Optional chaining",
  "missing-symbol": "Missing symbols",
  "type-conversion": "Type conversion",
  other: "Other",
};

const MISSING_SYMBOL_PATTERN = /cannot find.*in scope/;
const SYNTAX_PATTERN = /expected.*declaration|unexpected.*identifier/;

/**
 * Independent line predicates. Every rule is applied to every line and a
 * line may satisfy more than one rule; nothing here partitions the errors.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: "syntax",
    label: CATEGORY_LABELS.syntax,
    priority: 1,
    matches: (line) => SYNTAX_PATTERN.test(line),
    hint: "Check file structure and syntax; these can mask other issues.",
  },
  {
    category: "optional-chaining",
    label: CATEGORY_LABELS["optional-chaining"],
    priority: 2,
    matches: (line) => line.includes("cannot use optional chaining on non-optional"),
    hint: "Remove `?.` on values that are not optional.",
  },
  {
    category: "missing-symbol",
    label: CATEGORY_LABELS["missing-symbol"],
    priority: 3,
    matches: (line) => MISSING_SYMBOL_PATTERN.test(line),
    hint: "Add the missing declarations or imports.",
  },
  {
    category: "type-conversion",
    label: CATEGORY_LABELS["type-conversion"],
    priority: 4,
    matches: (line) => line.includes("cannot convert value of type"),
    hint: "Check return types and optional unwrapping.",
  },
];

export const REMEDIATION_ORDER: readonly MatchedCategory[] = [...CATEGORY_RULES]
  .sort((left, right) => left.priority - right.priority)
  .map((rule) => rule.category);

/** Every category in display order: the remediation order, then `other`. */
export const CATEGORY_DISPLAY_ORDER: readonly ErrorCategory[] = [...REMEDIATION_ORDER, "other"];
