import React from 'react';
import { Box, Text } from 'ink';
import type { Card } from '../domain';

interface CardListProps {
    cards: Card[];
    /** Heading printed before the cards, e.g. "Cards" or "Matches" */
    heading?: string;
    emptyText?: string;
}

export function formatCardLine(card: Card): string {
    return `- ${card.id}: ${card.front}  ->  ${card.back}`;
}

export const CardList: React.FC<CardListProps> = ({ cards, heading = 'Cards', emptyText = '(No cards yet.)' }) => {
    if (cards.length === 0) {
        return <Text dimColor>{emptyText}</Text>;
    }

    return (
        <Box flexDirection="column">
            <Text bold>{heading} ({cards.length}):</Text>
            {cards.map(card => (
                <Text key={card.id}>{formatCardLine(card)}</Text>
            ))}
        </Box>
    );
};
