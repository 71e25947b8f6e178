import { createApp } from './src/app';
import { getAppConfig } from './src/config/app-config';
import { createTrainSearchService } from './src/services/train-search.service';

function startServer() {
    try {
        const config = getAppConfig();
        const app = createApp({
            searchService: createTrainSearchService(config),
            corsOrigins: config.corsOrigins,
        });

        app.listen(config.port, () => {
            console.log(`🚂 Server in ascolto sulla porta ${config.port} (fuso orario ${config.timeZone})`);
        });
    } catch (error) {
        console.error('Errore avvio server:', error);
        process.exit(1);
    }
}

startServer();
