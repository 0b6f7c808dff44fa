import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 Statement analysis API listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🏦 Banks configured: ${container.registry.banks().join(', ')}`);
});
