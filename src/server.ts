import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createWebhookApp } from './infrastructure/http/WebhookApp.js';

const port = Number(process.env.PORT ?? 3000);
const container = new AppContainer();
const app = createWebhookApp(container.orchestrator);

app.listen(port, () => {
  console.log(`🚀 Expense bot webhook listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🗄️ Appwrite configured: ${container.hasLiveAppwrite()}`);
  console.log(`🤖 Extraction model: ${container.config.extraction.model}`);
});
