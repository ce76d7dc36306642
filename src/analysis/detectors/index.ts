/**
 * Rule bodies keyed by rule id.
 */

import { LocalRuleId } from "../rules";
import { missingResourceReleaseText, repeatedLiteralText, wallClockSleepText } from "./text";
import {
  missingResourceRelease,
  repeatedLiteral,
  resourceLoadInLoop,
  stimulusInLoop,
  trialLoop,
  wallClockSleep,
} from "./tree";
import { RuleImplementation } from "./types";

export type { RuleContext, RuleHit, RuleImplementation } from "./types";

export const RULE_IMPLEMENTATIONS: Record<LocalRuleId, RuleImplementation> = {
  STIMULUS_IN_LOOP: { tree: stimulusInLoop },
  RESOURCE_LOAD_IN_LOOP: { tree: resourceLoadInLoop },
  WALL_CLOCK_SLEEP: { tree: wallClockSleep, text: wallClockSleepText },
  REPEATED_LITERAL: { tree: repeatedLiteral, text: repeatedLiteralText },
  MISSING_RESOURCE_RELEASE: { tree: missingResourceRelease, text: missingResourceReleaseText },
  TRIAL_LOOP: { tree: trialLoop },
};
