import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import { listCollectionNames } from '../domain';
import { Menu } from './Menu';
import { PressEnter } from './PressEnter';

interface CollectionPickerProps {
    title: string;
    onPick: (name: string) => void;
    onCancel: () => void;
}

// Collection names can be anything, so cancel uses a value no name can take
const CANCEL = '\u0000cancel';

export const CollectionPicker: React.FC<CollectionPickerProps> = ({ title, onPick, onCancel }) => {
    const registry = useAppStore(state => state.registry);
    const names = useMemo(() => listCollectionNames(registry), [registry]);

    if (names.length === 0) {
        return (
            <Box flexDirection="column">
                <Text>Nothing to select.</Text>
                <PressEnter onContinue={onCancel} />
            </Box>
        );
    }

    const items = [
        ...names.map(name => ({ label: name, value: name })),
        { label: 'Cancel', value: CANCEL },
    ];

    return (
        <Menu
            title={title}
            items={items}
            onSelect={(value) => (value === CANCEL ? onCancel() : onPick(value))}
        />
    );
};
