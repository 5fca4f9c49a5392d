import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { generateText, type ModelMessage } from 'ai';
import type { ReasoningEngine } from './types.js';
import type { ResolvedGoal, SceneSnapshot, StepRecord } from '../sessions/types.js';
import type { ScreenshotStore } from '../utils/artifacts.js';
import { parseDecisionText, type ActionSpec } from '../engine/actionSpec.js';
import { buildSystemPrompt, buildDecisionPrompt } from './promptTemplate.js';
import { ReasoningError, getErrorMessage } from '../errors.js';

export interface GeminiEngineOptions {
  apiKey: string;
  model: string;
  screenshots: ScreenshotStore;
  temperature?: number;
}

export class GeminiReasoningEngine implements ReasoningEngine {
  private google: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(private readonly options: GeminiEngineOptions) {
    this.google = createGoogleGenerativeAI({ apiKey: options.apiKey });
  }

  async decide(goal: ResolvedGoal, history: readonly StepRecord[], snapshot: SceneSnapshot): Promise<ActionSpec> {
    const image = await this.options.screenshots.load(snapshot.screenshotRef);

    const prompt = buildDecisionPrompt(goal, history, snapshot);
    const userMessage: ModelMessage = {
      role: 'user',
      content: image
        ? [
            { type: 'image', image },
            { type: 'text', text: prompt },
          ]
        : [{ type: 'text', text: prompt }],
    };

    let text: string;
    try {
      const response = await generateText({
        model: this.google(this.options.model),
        system: buildSystemPrompt(goal),
        messages: [userMessage],
        temperature: this.options.temperature ?? 0.2,
      });
      text = response.text.trim();
    } catch (err) {
      throw new ReasoningError(`Reasoning backend unavailable: ${getErrorMessage(err)}`);
    }

    return parseDecisionText(text);
  }
}
