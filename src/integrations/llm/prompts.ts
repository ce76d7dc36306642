/**
 * Prompt builders for remote script analysis.
 */

import type { FindingCategory } from "../../analysis/types";
import { PromptConfig } from "./types";

export const SYSTEM_PROMPT = `You are an expert in PsychoPy, the Python library for building psychology experiments.

PsychoPy has two interfaces:
1. Builder: a visual editor with routines, loops and components such as TextStim, ImageStim, Keyboard and Sound.
2. Coder: plain Python scripts for experiments Builder cannot express.

Key concepts:
- Stimuli (visual.TextStim, visual.ImageStim, sound.Sound) are drawn to a visual.Window.
- Loops and trial sequences are handled by data.TrialHandler and data.ExperimentHandler.
- Timing uses core.Clock, core.CountdownTimer, core.wait() and frame counting with win.flip().
- Responses come from event.getKeys(), keyboard.Keyboard and mouse.Mouse.

Sensitive values in the script have been replaced with placeholders such as <API_KEY> or <FILE_PATH>. Treat them as opaque.

Answer with a single JSON object and nothing else.`;

const RESPONSE_SCHEMA = `{
  "summary": "Brief description of what the script does",
  "builder_mapping": [
    {
      "original_code": "exact code from the script",
      "description": "what this code does",
      "builder_equivalent": "suggested Builder component(s)",
      "explanation": "why this mapping fits"
    }
  ],
  "performance_optimizations": [
    {
      "issue": "the performance problem",
      "original_code": "exact code from the script",
      "improved_code": "optimized version",
      "explanation": "why it is faster"
    }
  ],
  "best_practices": [
    {
      "issue": "the practice being violated",
      "original_code": "exact code from the script",
      "improved_code": "improved version",
      "explanation": "why it is better"
    }
  ],
  "general_suggestions": ["suggestions that fit no other section"]
}`;

const FOCUS_BY_CATEGORY: Partial<Record<FindingCategory, string>> = {
  BUILDER_MAPPING:
    "Code that maps onto Builder components: trial loops (Loop with nReps), stimulus sequences (routines), " +
    "response collection (Keyboard and Mouse components) and manual data saving.",
  PERFORMANCE:
    "Performance problems: stimuli created inside loops, media loaded during trials, time.sleep() used for " +
    "timing, and per-frame work that could be precomputed.",
  BEST_PRACTICE:
    "PsychoPy best practices: magic numbers that should be constants, windows, files and devices that are " +
    "never closed, missing core.quit(), and hard-coded values that belong in a conditions file.",
};

/**
 * Build the prompt requesting the response schema, focused on the enabled
 * categories.
 */
export function buildAnalysisPrompt(
  enabledCategories: readonly FindingCategory[],
  settings: { model?: string; maxTokens?: number; temperature?: number } = {}
): PromptConfig {
  const focus = enabledCategories
    .map((category) => FOCUS_BY_CATEGORY[category])
    .filter((text): text is string => text !== undefined)
    .map((text, index) => `${index + 1}. ${text}`);

  const focusSection = focus.length > 0 ? `\n\nFocus on:\n${focus.join("\n")}` : "";

  const userPrompt = `Analyze the PsychoPy script below and reply in this JSON format:

${RESPONSE_SCHEMA}

Copy "original_code" verbatim from the script so it can be located. Leave a section as an empty array when there is nothing to report.${focusSection}`;

  return {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt,
    model: settings.model,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
  };
}
