/**
 * Centralized help content for policy controls and results.
 * Plain-language descriptions for non-experts.
 * Format: { title, description, example? }
 */

export type HelpEntry = {
  title: string;
  description: string;
  example?: string;
};

/** Format HelpEntry for tooltip content (description + optional example). */
export function formatHelpContent(entry: HelpEntry): string {
  return entry.example
    ? `${entry.description} Example: ${entry.example}`
    : entry.description;
}

/** Policy design and earner assumption controls */
export const HELP_POLICY = {
  matchRate: {
    title: "Matching rate",
    description:
      "The program matches a saver's own contributions up to this percentage of their annual income. Contributions above the cap are not matched.",
    example: "At a 3% match, someone earning $30,000 who saves 5% receives $900 a year",
  },
  phaseout: {
    title: "Benefit phaseout",
    description:
      "Slow phaseout caps the match above one half of median earnings and cuts it by 3% per thousand dollars over the threshold. Fast phaseout starts at two thirds of median earnings and cuts 5% per thousand.",
  },
  takeupRate: {
    title: "Takeup rate",
    description:
      "Share of eligible earners who enroll. Some never enroll because they do not know about the program or cannot set money aside.",
  },
  leakageRate: {
    title: "Early withdrawal",
    description:
      "Share of their own contributions that savers withdraw before retirement to cover emergencies. Matched dollars cannot be withdrawn early.",
    example: "At 30%, $1,000 of own savings leaves $700 invested",
  },
  roi: {
    title: "Average annual investment returns",
    description:
      "Assumed yearly return on account balances. 3% is a low baseline; 5% and 7% span the low and high end of realistic returns.",
  },
  income: {
    title: "Annual income",
    description: "The earner's yearly pay, held constant over the projection.",
  },
  contributionRate: {
    title: "Contribution rate",
    description:
      "Share of income the earner saves each year. Only the part up to the matching rate is matched.",
  },
  variant: {
    title: "Leakage applies to",
    description:
      "Own savings only: the match goes in untouched and early withdrawals come from the earner's own contributions. Whole deposit: withdrawals reduce the combined deposit.",
  },
} satisfies Record<string, HelpEntry>;

/** Result table and chart help */
export const HELP_RESULTS = {
  annualEffects: {
    title: "Annual effects",
    description:
      "Federal cost (negative) and wealth generated in each year of the program, in billions of dollars. Total is the full-horizon figure.",
  },
  cumulativeEffects: {
    title: "Cumulative effects",
    description:
      "Running totals of cost and wealth generated since the program started. Cost is shown as a positive amount so both lines share one axis.",
  },
  matchGain: {
    title: "Wealth from the match",
    description:
      "Difference in final-year wealth between saving with the match and saving the same amount without it.",
  },
} satisfies Record<string, HelpEntry>;
