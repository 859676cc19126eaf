import { StrictMode } from 'react';
import { render } from 'ink';
import App from './App';
import { resolveConfig, USAGE } from './config';
import { JsonFileGateway } from './services/persistence';
import { AppStoreContext, createAppStore } from './store/useAppStore';

const resolved = resolveConfig(process.argv.slice(2));

if (resolved.kind === 'help') {
    console.log(USAGE);
} else if (resolved.kind === 'error') {
    console.error(resolved.message);
    console.error(USAGE);
    process.exitCode = 1;
} else {
    const store = createAppStore({ gateway: new JsonFileGateway(resolved.config.dataFile) });

    const { waitUntilExit } = render(
        <StrictMode>
            <AppStoreContext.Provider value={store}>
                <App />
            </AppStoreContext.Provider>
        </StrictMode>,
    );

    waitUntilExit()
        .then(() => console.log('Bye!'))
        .catch((e: unknown) => {
            console.error(e);
            process.exitCode = 1;
        });
}
