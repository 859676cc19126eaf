import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import { listCollectionSummaries } from '../domain';
import { PressEnter } from './PressEnter';

interface CollectionListProps {
    onBack: () => void;
}

export const CollectionList: React.FC<CollectionListProps> = ({ onBack }) => {
    const registry = useAppStore(state => state.registry);
    const summaries = useMemo(() => listCollectionSummaries(registry), [registry]);

    return (
        <Box flexDirection="column">
            {summaries.length === 0 ? (
                <Text dimColor>(No collections yet.)</Text>
            ) : (
                summaries.map(({ name, cardCount }) => (
                    <Text key={name}>- {name} ({cardCount} cards)</Text>
                ))
            )}
            <PressEnter onContinue={onBack} />
        </Box>
    );
};
