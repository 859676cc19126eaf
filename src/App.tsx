import { useCallback, useState } from 'react';
import { Box, useApp } from 'ink';
import { useAppStore } from './store/useAppStore';
import { MainMenu } from './components/MainMenu';
import { CollectionPicker } from './components/CollectionPicker';
import { CollectionList } from './components/CollectionList';
import { CollectionMenu, ManageCardsMenu } from './components/CollectionMenu';
import {
    AddCardForm,
    CardListScreen,
    DeleteCardForm,
    EditCardForm,
    SearchCardsForm,
} from './components/CardEditor';
import { LearnView } from './components/LearnView';
import { PromptInput } from './components/PromptInput';
import { ConfirmPrompt } from './components/ConfirmPrompt';
import { NoticeBar } from './components/NoticeBar';
import type { Screen } from './types';

function App() {
    const { exit } = useApp();
    const [screen, setScreen] = useState<Screen>({ name: 'main' });
    const [pendingDelete, setPendingDelete] = useState<string | null>(null);

    const createCollection = useAppStore(state => state.createCollection);
    const deleteCollection = useAppStore(state => state.deleteCollection);
    const dismissNotice = useAppStore(state => state.dismissNotice);

    // Moving through menus clears the last notice; returning from an action keeps it
    const navigate = useCallback((next: Screen) => {
        dismissNotice();
        setScreen(next);
    }, [dismissNotice]);

    const returnTo = useCallback((next: Screen) => {
        setScreen(next);
    }, []);

    const renderScreen = () => {
        switch (screen.name) {
            case 'main':
                return <MainMenu navigate={navigate} onExit={exit} />;

            case 'create-collection':
                return (
                    <PromptInput
                        label="New collection name: "
                        required
                        onSubmit={(name) => {
                            createCollection(name);
                            returnTo({ name: 'main' });
                        }}
                        onCancel={() => returnTo({ name: 'main' })}
                    />
                );

            case 'open-collection':
                return (
                    <CollectionPicker
                        title="Open which collection?"
                        onPick={(name) => {
                            navigate({ name: 'collection', collection: name });
                        }}
                        onCancel={() => returnTo({ name: 'main' })}
                    />
                );

            case 'list-collections':
                return <CollectionList onBack={() => returnTo({ name: 'main' })} />;

            case 'delete-collection':
                if (pendingDelete !== null) {
                    return (
                        <ConfirmPrompt
                            message={`Delete collection '${pendingDelete}' and ALL its cards?`}
                            onConfirm={() => {
                                deleteCollection(pendingDelete);
                                setPendingDelete(null);
                                returnTo({ name: 'main' });
                            }}
                            onCancel={() => {
                                setPendingDelete(null);
                                returnTo({ name: 'main' });
                            }}
                        />
                    );
                }
                return (
                    <CollectionPicker
                        title="Delete which collection?"
                        onPick={setPendingDelete}
                        onCancel={() => returnTo({ name: 'main' })}
                    />
                );

            case 'collection':
                return <CollectionMenu collection={screen.collection} navigate={navigate} />;

            case 'learn':
                return (
                    <LearnView
                        collection={screen.collection}
                        onDone={() => returnTo({ name: 'collection', collection: screen.collection })}
                    />
                );

            case 'add-card': {
                const back: Screen = screen.returnTo === 'manage'
                    ? { name: 'manage-cards', collection: screen.collection }
                    : { name: 'collection', collection: screen.collection };
                return <AddCardForm collection={screen.collection} onDone={() => returnTo(back)} />;
            }

            case 'manage-cards':
                return <ManageCardsMenu collection={screen.collection} navigate={navigate} />;

            case 'list-cards':
                return (
                    <CardListScreen
                        collection={screen.collection}
                        onDone={() => returnTo({ name: 'manage-cards', collection: screen.collection })}
                    />
                );

            case 'edit-card':
                return (
                    <EditCardForm
                        collection={screen.collection}
                        onDone={() => returnTo({ name: 'manage-cards', collection: screen.collection })}
                    />
                );

            case 'delete-card':
                return (
                    <DeleteCardForm
                        collection={screen.collection}
                        onDone={() => returnTo({ name: 'manage-cards', collection: screen.collection })}
                    />
                );

            case 'search-cards':
                return (
                    <SearchCardsForm
                        collection={screen.collection}
                        onDone={() => returnTo({ name: 'manage-cards', collection: screen.collection })}
                    />
                );
        }
    };

    return (
        <Box flexDirection="column">
            {renderScreen()}
            <NoticeBar />
        </Box>
    );
}

export default App;
