import { createApp, createService } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(createService(config), config);

app.listen(config.port, () => {
  console.log(`========================================`);
  console.log(`API Server listening on port ${config.port}`);
  console.log(`========================================`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
  console.log(`Settings endpoint: http://localhost:${config.port}/api/settings`);
  console.log(`Views endpoint: http://localhost:${config.port}/api/views`);
});
