import 'dotenv/config';
import { createServer } from 'node:http';
import { Server as SocketIOServer } from 'socket.io';
import { createAgentFactory } from './agents.js';
import { createApp, parseViewer } from './app.js';
import { loadConfig } from './config.js';
import { AgentCoordinator } from './deliberation.js';
import { errorMessage } from './errors.js';
import { GameStore } from './gameStore.js';
import { FileHistoryStore } from './history.js';
import { LlmClient } from './llmClient.js';
import { createLogger, setLogLevel } from './logger.js';
import { type Viewer } from './types.js';

const config = loadConfig();
setLogLevel(config.logLevel);
const logger = createLogger('server');

const history = new FileHistoryStore(config.historyDir);
const store = new GameStore({ history, defaultModel: config.llm.model });
const coordinator = new AgentCoordinator(
  store,
  createAgentFactory((model) => new LlmClient({ ...config.llm, model })),
  { maxAutoplaySteps: config.autoplayMaxSteps },
);

const app = createApp({ store, coordinator, history, corsOrigin: config.corsOrigin });
const httpServer = createServer(app);

const io = new SocketIOServer(httpServer, {
  cors: { origin: config.corsOrigin, methods: ['GET', 'POST', 'DELETE'] },
});

io.on('connection', (socket) => {
  const auth: unknown = socket.handshake.auth;
  const gameId = typeof auth === 'object' && auth !== null && 'gameId' in auth ? auth.gameId : undefined;
  const requestedViewer = typeof auth === 'object' && auth !== null && 'viewer' in auth ? auth.viewer : undefined;

  if (typeof gameId !== 'string' || !store.has(gameId)) {
    socket.emit('game:error', { message: 'Game not found.' });
    socket.disconnect(true);
    return;
  }

  let viewer: Viewer;
  try {
    viewer = parseViewer(requestedViewer);
  } catch (err) {
    socket.emit('game:error', { message: errorMessage(err) });
    socket.disconnect(true);
    return;
  }

  const unsubscribe = store.broadcaster.subscribe(gameId, {
    id: socket.id,
    viewer,
    deliver: (snapshot) => {
      socket.emit('game:update', snapshot);
    },
  });
  logger.info('Observer connected', { socketId: socket.id, gameId, viewer });
  socket.emit('game:update', store.snapshot(gameId, viewer));

  socket.on('disconnect', () => {
    unsubscribe();
    logger.info('Observer disconnected', { socketId: socket.id, gameId });
  });
});

httpServer.listen(config.port, () => {
  logger.info(`Cluegrid server running on http://localhost:${config.port}`);
});
