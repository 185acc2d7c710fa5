import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/environment';
import { createServices } from './container';

dotenv.config();

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const reportKey = (name: string, configured: boolean): void => {
  if (configured) {
    console.log(`✓ ${name} configured`);
  } else {
    console.warn(`✗ ${name} missing: related features will be unavailable`);
  }
};

// Start server
app.listen(config.port, () => {
  console.log(`\n🚀 Server is running on http://localhost:${config.port}`);
  console.log(`📝 Environment: ${config.nodeEnv}`);
  console.log(`🤖 Model: ${config.geminiModel}\n`);
  reportKey('GEMINI_API_KEY', services.ai.isConfigured);
  reportKey('GOOGLE_API_KEY', services.geocoding.isConfigured);
  reportKey('OPENWEATHERMAP_API_KEY', services.weather.isConfigured);
});

export default app;
