import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.app;

app.listen(port, () => {
  container.logger.info(`🚀 Statement Ledger API listening on port ${port}`, {
    environment: process.env.NODE_ENV || 'development',
    modelSupport: container.hasModelSupport(),
  });
});
