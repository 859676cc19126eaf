import React from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import { Menu } from './Menu';
import type { Navigate } from '../types';

type CollectionAction = 'learn' | 'add' | 'manage' | 'back';
type ManageAction = 'list' | 'add' | 'edit' | 'delete' | 'search' | 'back';

interface CollectionMenuProps {
    collection: string;
    navigate: Navigate;
}

const CollectionHeader: React.FC<{ collection: string }> = ({ collection }) => {
    const cardCount = useAppStore(state => state.registry.collections.get(collection)?.cards.length ?? 0);
    return <Text bold>Collection: {collection}  |  Cards: {cardCount}</Text>;
};

export const CollectionMenu: React.FC<CollectionMenuProps> = ({ collection, navigate }) => {
    const handleSelect = (action: CollectionAction) => {
        switch (action) {
            case 'learn':
                navigate({ name: 'learn', collection });
                break;
            case 'add':
                navigate({ name: 'add-card', collection, returnTo: 'collection' });
                break;
            case 'manage':
                navigate({ name: 'manage-cards', collection });
                break;
            case 'back':
                navigate({ name: 'main' });
                break;
        }
    };

    return (
        <Box flexDirection="column">
            <CollectionHeader collection={collection} />
            <Menu<CollectionAction>
                items={[
                    { label: 'Learn', value: 'learn' },
                    { label: 'Add card', value: 'add' },
                    { label: 'Manage cards', value: 'manage' },
                    { label: 'Back', value: 'back' },
                ]}
                onSelect={handleSelect}
            />
        </Box>
    );
};

export const ManageCardsMenu: React.FC<CollectionMenuProps> = ({ collection, navigate }) => {
    const handleSelect = (action: ManageAction) => {
        switch (action) {
            case 'list':
                navigate({ name: 'list-cards', collection });
                break;
            case 'add':
                navigate({ name: 'add-card', collection, returnTo: 'manage' });
                break;
            case 'edit':
                navigate({ name: 'edit-card', collection });
                break;
            case 'delete':
                navigate({ name: 'delete-card', collection });
                break;
            case 'search':
                navigate({ name: 'search-cards', collection });
                break;
            case 'back':
                navigate({ name: 'collection', collection });
                break;
        }
    };

    return (
        <Box flexDirection="column">
            <CollectionHeader collection={collection} />
            <Text>Manage cards</Text>
            <Menu<ManageAction>
                items={[
                    { label: 'List cards', value: 'list' },
                    { label: 'Add card', value: 'add' },
                    { label: 'Edit card', value: 'edit' },
                    { label: 'Delete card', value: 'delete' },
                    { label: 'Search', value: 'search' },
                    { label: 'Back', value: 'back' },
                ]}
                onSelect={handleSelect}
            />
        </Box>
    );
};
