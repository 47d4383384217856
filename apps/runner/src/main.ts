import { parseConfigFromEnv } from './config';
import { createLogger } from './logger';
import { playMatch } from './play-match';
import { MatchService } from './service/match-service';
import { InMemoryMatchStore } from './store/in-memory-match-store';

const config = parseConfigFromEnv(process.env);
const logger = createLogger(config);

const start = async (): Promise<void> => {
  const service = new MatchService(new InMemoryMatchStore(), logger, { maxActionLog: config.maxActionLog });
  logger.info({ matches: config.matchCount, players: config.playerCount, mode: config.mode }, 'runner starting');

  for (let index = 1; index <= config.matchCount; index += 1) {
    try {
      const scores = await playMatch(service, config, index, logger);
      logger.info({ match: index, scores }, 'final scores');
    } catch (error) {
      const failure = service.handleFailure(error, { match: index });
      logger.error({ match: index, errorCode: failure.code }, 'match aborted');
      process.exitCode = 1;
    }
  }
};

void start();
