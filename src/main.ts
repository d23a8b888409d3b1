import '@shoelace-style/shoelace/dist/themes/light.css';
import './components/modules/brewmap-app';
import { DEFAULT_APP_CONFIG, loadAppConfig } from './config';

async function bootstrap(): Promise<void> {
  const app = document.querySelector('brewmap-app');
  if (!app) {
    console.error('[main] No <brewmap-app> element in the page.');
    return;
  }

  try {
    const { config } = await loadAppConfig();
    app.config = config;
  } catch (error) {
    console.error('[main] Failed to load configuration, using defaults.', error);
    app.config = DEFAULT_APP_CONFIG;
  }
}

bootstrap().catch((error: unknown) => {
  console.error('[main] Bootstrap failed.', error);
});
