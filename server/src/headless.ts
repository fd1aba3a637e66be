import 'dotenv/config';
import { createAgentFactory } from './agents.js';
import { loadConfig } from './config.js';
import { AgentCoordinator } from './deliberation.js';
import { errorMessage } from './errors.js';
import { GameStore } from './gameStore.js';
import { FileHistoryStore } from './history.js';
import { LlmClient } from './llmClient.js';
import { createLogger, setLogLevel } from './logger.js';
import { BOARD_SIZES } from './types.js';

// Plays one game with agents in all four seats and prints the result.

const config = loadConfig();
setLogLevel(config.logLevel);
const logger = createLogger('headless');

async function main(): Promise<void> {
  const boardSize = BOARD_SIZES.find((s) => String(s) === process.argv[2]) ?? BOARD_SIZES[0];
  const store = new GameStore({ history: new FileHistoryStore(config.historyDir), defaultModel: config.llm.model });
  const coordinator = new AgentCoordinator(
    store,
    createAgentFactory((model) => new LlmClient({ ...config.llm, model })),
    { maxAutoplaySteps: config.autoplayMaxSteps },
  );

  const game = store.createGame({
    boardSize,
    players: { RED_SPYMASTER: 'agent', RED_GUESSER: 'agent', BLUE_SPYMASTER: 'agent', BLUE_GUESSER: 'agent' },
  });
  logger.info('Headless game started', { gameId: game.id, boardSize, model: game.config.llmModel });
  console.log(game.cards.map((c) => `${c.word}:${c.type}`).join(' '));

  const steps = await coordinator.autoplay(game.id);
  const final = store.snapshot(game.id, 'spymaster');
  for (const line of final.log) console.log(line);

  if (final.winner) {
    logger.info('Headless game finished', { gameId: game.id, winner: final.winner, steps, score: final.score });
  } else {
    logger.warn('Headless game stopped before a winner', { gameId: game.id, phase: final.phase, steps });
    await store.exportHistory(game.id);
  }
}

main().catch((err: unknown) => {
  logger.error('Headless run failed', { error: errorMessage(err) });
  process.exitCode = 1;
});
