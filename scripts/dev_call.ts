// scripts/dev_call.ts
// Runs one screening call in the terminal. You play both the candidate and the model:
//   plain text        -> candidate turn
//   /tool name {json} -> tool call from the model, e.g. /tool mark_pass {"answer_summary":"ja"}
//   /away, /present   -> candidate presence
//   /quit             -> hang up
import fs from 'node:fs';
import readline from 'node:readline';
import { ScreeningCall } from '../src/calls/screeningCall';
import { Scheduler } from '../src/scheduling/scheduler';
import { STAGE_NAMES, parseSessionInput, type SessionInputPayload, type StageName } from '../src/screening/types';
import type {
  AgentActivation,
  SpeakOptions,
  SpeechEventHandlers,
  SpeechSession,
} from '../src/speech/types';

const DEV_INPUT: SessionInputPayload = {
  call_id: 'dev_local',
  candidate_name: 'Sam Peeters',
  candidate_known: true,
  require_consent: false,
  candidate_record: {
    known_answers: { driving_licence: 'ja' },
    existing_booking_date: null,
  },
  job_title: 'Magazijnmedewerker',
  office_location: 'Gent Zuid',
  office_address: 'Voorbeeldstraat nummer 12',
  knockout_questions: [
    { id: 'q1', text: 'Heb je een rijbewijs B?', data_key: 'driving_licence' },
    { id: 'q2', text: 'Kan je werken in ploegen?', data_key: 'shift_work' },
    {
      id: 'q3',
      text: 'Kan je lasten tot 15 kilo heffen?',
      context: 'Af en toe tillen, niet de hele dag.',
      data_key: 'lifting',
    },
  ],
  open_questions: [
    { id: 'oq1', text: 'Waarom wil je in een magazijn werken?', description: 'Motivatie' },
    { id: 'oq2', text: 'Welke ervaring heb je met orderpicking?', description: 'Ervaring' },
    { id: 'oq3', text: 'Wanneer zou je kunnen starten?', description: 'Beschikbaarheid' },
  ],
  is_playground: true,
};

function parseArgs(argv: string[]): { start?: StageName; inputPath?: string } {
  const result: { start?: StageName; inputPath?: string } = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === '--start' && value) {
      const stage = STAGE_NAMES.find((name) => name === value);
      if (!stage) {
        console.error(`Unknown stage '${value}'. Expected one of: ${STAGE_NAMES.join(', ')}`);
        process.exit(2);
      }
      result.start = stage;
      i += 1;
    } else if (arg === '--input' && value) {
      result.inputPath = value;
      i += 1;
    }
  }
  return result;
}

class ConsoleSpeechSession implements SpeechSession {
  public handlers?: SpeechEventHandlers;
  public activeAgent = '';

  constructor(public readonly callId: string, private readonly onClose: () => void) {}

  bind(handlers: SpeechEventHandlers): void {
    this.handlers = handlers;
  }

  async say(text: string, _options?: SpeakOptions): Promise<void> {
    console.log(`\nagent> ${text}`);
    this.handlers?.onConversationItem({ role: 'assistant', message: text });
  }

  async generateReply(instructions: string, _options?: SpeakOptions): Promise<void> {
    console.log(`\n[model speaks from] ${instructions}`);
  }

  activateAgent(activation: AgentActivation): void {
    this.activeAgent = activation.agentId;
    const tools = activation.tools.map((tool) => tool.name).join(', ');
    console.log(`\n[agent ${activation.agentId} | ${activation.turnDetection}] tools: ${tools}`);
  }

  clearUserTurn(): void {
    console.log('[clear user turn]');
  }

  setUserAwayTimeout(seconds: number): void {
    console.log(`[user away timeout ${seconds}s]`);
  }

  setLanguage(language: string): void {
    console.log(`[language ${language}]`);
  }

  async shutdown(options: { drain: boolean }): Promise<void> {
    console.log(`[shutdown drain=${options.drain}]`);
  }

  close(reason: string): void {
    console.log(`[closed: ${reason}]`);
    this.onClose();
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const payload: unknown = args.inputPath
    ? JSON.parse(fs.readFileSync(args.inputPath, 'utf8'))
    : DEV_INPUT;
  const input = parseSessionInput(payload);
  if (args.start) {
    input.startAgent = args.start;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const speech = new ConsoleSpeechSession(input.callId, () => rl.close());
  const call = new ScreeningCall({
    input,
    speech,
    runtime: {
      scheduling: new Scheduler({ timeZone: 'Europe/Brussels' }),
      agentName: 'Anna',
      companyName: 'Jobline',
      userAwayTimeoutS: 4,
      openQuestionsAwayTimeoutS: 6,
      timeZone: 'Europe/Brussels',
      now: () => new Date(),
    },
  });

  let toolSeq = 0;
  rl.on('line', (line) => {
    const handlers = speech.handlers;
    const text = line.trim();
    if (!handlers || text === '') {
      return;
    }
    if (text === '/quit') {
      void call.hangup();
      return;
    }
    if (text === '/away' || text === '/present') {
      handlers.onUserState(text === '/away' ? 'away' : 'present');
      return;
    }
    if (text.startsWith('/tool ')) {
      const [name, ...rest] = text.slice('/tool '.length).split(' ');
      const rawArgs = rest.join(' ').trim();
      let parsedArgs: Record<string, unknown> = {};
      try {
        const parsed: unknown = rawArgs ? JSON.parse(rawArgs) : {};
        if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
          parsedArgs = Object.fromEntries(Object.entries(parsed));
        }
      } catch {
        console.error('tool arguments must be a JSON object');
        return;
      }
      toolSeq += 1;
      handlers
        .onToolCall({ id: `tool-${toolSeq}`, name, arguments: parsedArgs, agentId: speech.activeAgent })
        .then((output) => console.log(`[tool result] ${output ?? '(none)'}`))
        .catch((err) => console.error(err));
      return;
    }
    handlers.onConversationItem({ role: 'user', message: text });
    handlers.onUserTurn(text);
  });

  call.start();
  const summary = await call.whenEnded();
  console.log(JSON.stringify({ reason: summary.reason, result: summary.result, usage: summary.usage }, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
