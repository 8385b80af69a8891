import { GoogleGenAI } from "@google/genai";
import type { DietPlanInput, WorkoutPlanInput } from "../helpers/plan-schemas.js";
import { ExternalServiceUnavailableError } from "../helpers/errors.js";
import type { DietGoals, GenerationProfile, PlanGenerator, WorkoutPreferences } from "./plan-generator.js";
import { buildDietPrompt, buildWorkoutPrompt } from "./prompts.js";
import { parseDietPlanResponse, parseWorkoutPlanResponse } from "./parse-plan.js";

/** Characters of the prompt kept on the saved plan as a provenance note. */
export const PROVENANCE_LIMIT = 500;

/** The start of the prompt, followed by any note the parser left on the plan. */
export function provenanceNote(prompt: string, parseNote: string | null | undefined): string {
  const kept = prompt.slice(0, PROVENANCE_LIMIT);
  return parseNote ? `${kept}\n\n${parseNote}` : kept;
}

export interface GeminiOptions {
  apiKey: string | null;
  model: string;
}

export class GeminiPlanGenerator implements PlanGenerator {
  private readonly client: GoogleGenAI | null;

  constructor(private readonly options: GeminiOptions) {
    this.client = options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }) : null;
    if (!this.client) {
      console.warn("[plan-generator] GEMINI_API_KEY not set, plan generation disabled");
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  private async complete(prompt: string): Promise<string> {
    if (!this.client) {
      throw new ExternalServiceUnavailableError("Plan generation is not configured");
    }
    try {
      const response = await this.client.models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: { temperature: 0.7, topP: 0.9 },
      });
      return response.text ?? "";
    } catch (err) {
      console.error("[plan-generator] Generation request failed:", err instanceof Error ? err.stack : err);
      throw new ExternalServiceUnavailableError("Plan generation failed", { cause: err });
    }
  }

  async generateWorkoutPlan(
    profile: GenerationProfile,
    preferences: WorkoutPreferences
  ): Promise<WorkoutPlanInput> {
    const prompt = buildWorkoutPrompt(profile, preferences);
    const plan = parseWorkoutPlanResponse(await this.complete(prompt));
    console.log("[plan-generator] Workout plan generated");
    return {
      ...plan,
      name: preferences.name,
      ai_generated: true,
      generation_prompt: provenanceNote(prompt, plan.generation_prompt),
    };
  }

  async generateDietPlan(
    profile: GenerationProfile,
    availableFoods: string[],
    goals: DietGoals
  ): Promise<DietPlanInput> {
    const prompt = buildDietPrompt(profile, availableFoods, goals);
    const plan = parseDietPlanResponse(await this.complete(prompt));
    console.log("[plan-generator] Diet plan generated");
    return {
      ...plan,
      name: goals.name,
      ai_generated: true,
      generation_prompt: provenanceNote(prompt, plan.generation_prompt),
    };
  }
}
