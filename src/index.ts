import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { RaceRatingService } from './services/race-service.js';
import { getRepository } from './store/index.js';

dotenv.config();

const service = new RaceRatingService(loadConfig(), getRepository());
const app = createApp(service);

export { app };

if (process.env.NODE_ENV !== 'test') {
  const port = process.env.PORT ? Number(process.env.PORT) : 8080;
  app.listen(port, () => console.log(`race ratings listening on :${port}`));
}
