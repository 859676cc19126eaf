import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import { listCollectionNames } from '../domain';
import { Menu } from './Menu';
import type { Navigate } from '../types';

type MainAction = 'create' | 'open' | 'list' | 'delete' | 'exit';

interface MainMenuProps {
    navigate: Navigate;
    onExit: () => void;
}

export const MainMenu: React.FC<MainMenuProps> = ({ navigate, onExit }) => {
    const registry = useAppStore(state => state.registry);
    const collectionCount = useMemo(() => listCollectionNames(registry).length, [registry]);

    const handleSelect = (action: MainAction) => {
        switch (action) {
            case 'create':
                navigate({ name: 'create-collection' });
                break;
            case 'open':
                navigate({ name: 'open-collection' });
                break;
            case 'list':
                navigate({ name: 'list-collections' });
                break;
            case 'delete':
                navigate({ name: 'delete-collection' });
                break;
            case 'exit':
                onExit();
                break;
        }
    };

    return (
        <Box flexDirection="column">
            <Text bold>Terminal Flashcards</Text>
            <Text>{'-'.repeat(20)}</Text>
            <Text>Collections: {collectionCount}</Text>
            <Menu<MainAction>
                items={[
                    { label: 'Create collection', value: 'create' },
                    { label: 'Open collection', value: 'open' },
                    { label: 'List collections', value: 'list' },
                    { label: 'Delete collection', value: 'delete' },
                    { label: 'Exit', value: 'exit' },
                ]}
                onSelect={handleSelect}
            />
        </Box>
    );
};
