/**
 * Status message returned to the hosting runtime for a pipeline run, and
 * the parser for reading such a message back.
 */

import type { PipelineResult } from '../types/generation.js';

const LABELS = {
  ORIGINAL: 'Original prompt: ',
  ENHANCED: 'Enhanced prompt: ',
  IMAGE_OK: '✅ Image generated: ',
  IMAGE_FAILED: '❌ Image generation failed',
  MODEL_OK: '✅ 3D model generated: ',
  MODEL_FAILED: '❌ 3D model generation failed',
  WARNING: '⚠️ ',
  ERROR: 'Error processing request: '
} as const;

export interface ParsedPipelineMessage {
  originalPrompt: string;
  enhancedPrompt: string;
  imagePath: string | null;
  modelPath: string | null;
  imageGenerated: boolean;
  modelGenerated: boolean;
  error: string | null;
}

/**
 * Render a run as a multi-line status message. A failed run that produced
 * nothing collapses to a single error line.
 */
export function formatPipelineMessage(result: PipelineResult): string {
  if (result.error && !result.imageGenerated && !result.modelGenerated) {
    return `${LABELS.ERROR}${result.error}`;
  }

  const lines = [
    `${LABELS.ORIGINAL}${oneLine(result.userPrompt)}`,
    `${LABELS.ENHANCED}${oneLine(result.enhancedPrompt)}`,
    result.imageGenerated && result.imagePath ? `${LABELS.IMAGE_OK}${result.imagePath}` : LABELS.IMAGE_FAILED,
    result.modelGenerated && result.modelPath ? `${LABELS.MODEL_OK}${result.modelPath}` : LABELS.MODEL_FAILED
  ];

  if (result.error) {
    lines.push(`${LABELS.WARNING}${result.error}`);
  }

  return lines.join('\n');
}

/**
 * Read a message produced by formatPipelineMessage
 */
export function parsePipelineMessage(message: string): ParsedPipelineMessage {
  const parsed: ParsedPipelineMessage = {
    originalPrompt: '',
    enhancedPrompt: '',
    imagePath: null,
    modelPath: null,
    imageGenerated: false,
    modelGenerated: false,
    error: null
  };

  for (const rawLine of message.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith(LABELS.ERROR)) {
      parsed.error = line.slice(LABELS.ERROR.length);
    } else if (line.startsWith(LABELS.ORIGINAL)) {
      parsed.originalPrompt = line.slice(LABELS.ORIGINAL.length);
    } else if (line.startsWith(LABELS.ENHANCED)) {
      parsed.enhancedPrompt = line.slice(LABELS.ENHANCED.length);
    } else if (line.startsWith(LABELS.IMAGE_OK)) {
      parsed.imageGenerated = true;
      parsed.imagePath = line.slice(LABELS.IMAGE_OK.length);
    } else if (line.startsWith(LABELS.MODEL_OK)) {
      parsed.modelGenerated = true;
      parsed.modelPath = line.slice(LABELS.MODEL_OK.length);
    } else if (line.startsWith(LABELS.WARNING)) {
      parsed.error = line.slice(LABELS.WARNING.length);
    }
  }

  return parsed;
}

function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}
