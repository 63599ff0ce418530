// Translate Example - word-level toy translator driven by beam search
// The "model" is a lookup table: the encoder maps each source word to its
// target word, and the decoder puts most of the probability on the next
// expected word.

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  Translator,
  createLogger,
  loadConfig,
  parseArgs,
  type DecoderOracle,
  type EncoderOracle,
} from '../../src/index.js';

const LexiconSchema = z.object({
  entries: z.record(z.string()),
});

interface TableState {
  expected: readonly number[];
  position: number;
}

const START = '<start>';
const STOP = '<stop>';
const UNK = '<unk>';

const lexicon = LexiconSchema.parse(
  JSON.parse(readFileSync(new URL('./lexicon.json', import.meta.url), 'utf8'))
);

const sourceWords = Object.keys(lexicon.entries);
const targetWords = [START, STOP, UNK, ...new Set(Object.values(lexicon.entries))];
const targetIds = new Map(targetWords.map((w, i) => [w, i]));
const stopId = 1;
const unkId = 2;

const encoder: EncoderOracle<TableState> = {
  encode(inputTokenIds) {
    const expected = inputTokenIds.map((id) => {
      const word = sourceWords[id];
      return word === undefined ? unkId : (targetIds.get(lexicon.entries[word]) ?? unkId);
    });
    return { expected, position: 0 };
  },
};

const decoder: DecoderOracle<TableState> = {
  step(_previous, state) {
    const next = state.position < state.expected.length ? state.expected[state.position] : stopId;
    // 0.8 on the expected word, the rest spread over every other non-start token
    const others = targetWords.length - 2;
    const probs = targetWords.map((_, id) => (id === 0 ? 0 : id === next ? 0.8 : 0.2 / others));
    return { probs, state: { expected: state.expected, position: state.position + 1 } };
  },
};

const config = loadConfig();

const args = parseArgs(
  {
    text: { type: 'string', default: 'the cat sees a bird', description: 'Text to translate' },
    beamWidth: { type: 'number', default: config.BEAM_WIDTH, min: 1, integer: true, description: 'Beam width' },
    maxSteps: { type: 'number', default: config.MAX_STEPS, min: 1, integer: true, description: 'Maximum output tokens' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log every decoding round' },
  } as const,
  process.argv.slice(2)
);

if (args.help) {
  console.log(args.helpText);
} else {
  const logger = createLogger({
    level: args.verbose ? 'debug' : (config.LOG_LEVEL ?? 'info'),
    production: config.NODE_ENV === 'production',
    service: 'translate-js',
  });
  const translator = new Translator({
    encoder,
    decoder,
    vocabulary: { startTokenId: 0, stopTokenId: stopId, size: targetWords.length },
    beamWidth: args.beamWidth,
    maxSteps: args.maxSteps,
    concurrency: config.DECODE_CONCURRENCY,
    logger,
  });

  // one sentence per "." so several inputs go through translateBatch
  const sentences = args.text
    .toLowerCase()
    .split('.')
    .map((s) => s.split(/\s+/).filter((w) => w.length > 0))
    .filter((words) => words.length > 0)
    .map((words) =>
      words.map((w) => {
        const id = sourceWords.indexOf(w);
        return id >= 0 ? id : sourceWords.length;
      })
    );

  const results = await translator.translateBatch(sentences);
  for (const result of results) {
    if (result.ok) {
      const words = result.tokens.filter((id) => id !== 0 && id !== stopId).map((id) => targetWords[id]);
      console.log(words.join(' '));
    } else {
      logger.error(result.error.message, { code: result.error.code });
      process.exitCode = 1;
    }
  }
}
