import { format } from 'date-fns';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { UsageReport } from '../speech/types';

// USD rates of the hosted models the speech side runs.
const LLM_PROMPT_USD_PER_MTOK = 0.4;
const LLM_COMPLETION_USD_PER_MTOK = 1.6;
const TTS_USD_PER_CHAR = 0.00001125;
const STT_USD_PER_HOUR = 0.462;

export interface UsageSummary {
  llm_prompt_tokens: number;
  llm_completion_tokens: number;
  tts_characters: number;
  stt_audio_duration: number;
  cost_usd: {
    llm: number;
    tts: number;
    stt: number;
    total: number;
  };
}

function round6(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

/** Sums the usage increments the speech side reports during a call. */
export class UsageTracker {
  private readonly totals: UsageReport = {
    llmPromptTokens: 0,
    llmCompletionTokens: 0,
    ttsCharacters: 0,
    sttAudioSeconds: 0,
  };

  public add(report: Partial<UsageReport>): void {
    this.totals.llmPromptTokens += report.llmPromptTokens ?? 0;
    this.totals.llmCompletionTokens += report.llmCompletionTokens ?? 0;
    this.totals.ttsCharacters += report.ttsCharacters ?? 0;
    this.totals.sttAudioSeconds += report.sttAudioSeconds ?? 0;
  }

  public summary(): UsageSummary {
    const { llmPromptTokens, llmCompletionTokens, ttsCharacters, sttAudioSeconds } = this.totals;
    const llm =
      (llmPromptTokens * LLM_PROMPT_USD_PER_MTOK) / 1_000_000 +
      (llmCompletionTokens * LLM_COMPLETION_USD_PER_MTOK) / 1_000_000;
    const tts = ttsCharacters * TTS_USD_PER_CHAR;
    const stt = (sttAudioSeconds / 3600) * STT_USD_PER_HOUR;

    return {
      llm_prompt_tokens: llmPromptTokens,
      llm_completion_tokens: llmCompletionTokens,
      tts_characters: ttsCharacters,
      stt_audio_duration: sttAudioSeconds,
      cost_usd: {
        llm: round6(llm),
        tts: round6(tts),
        stt: round6(stt),
        total: round6(llm + tts + stt),
      },
    };
  }
}

export interface UsageLogEntry {
  callId: string;
  candidateName: string;
  jobTitle: string;
  summary: UsageSummary;
  at?: Date;
}

/** Writes `<dir>/<callId>_<yyyyMMdd_HHmmss>.json` and returns its path. */
export async function writeUsageLog(dir: string, entry: UsageLogEntry): Promise<string> {
  const timestamp = format(entry.at ?? new Date(), 'yyyyMMdd_HHmmss');
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${entry.callId}_${timestamp}.json`);
  const data = {
    call_id: entry.callId,
    timestamp,
    candidate_name: entry.candidateName,
    job_title: entry.jobTitle,
    ...entry.summary,
  };
  await writeFile(filePath, JSON.stringify(data, null, 2));
  return filePath;
}
