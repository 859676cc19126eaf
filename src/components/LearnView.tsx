import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import { useAppStore } from '../store/useAppStore';
import { currentCard, getTallies } from '../domain';
import type { DrillOrder, DrillState } from '../domain';
import { Menu } from './Menu';
import { PressEnter } from './PressEnter';

interface LearnViewProps {
    collection: string;
    onDone: () => void;
}

const SEPARATOR = '-'.repeat(40);

const JudgmentPrompt: React.FC = () => {
    const submitAnswer = useAppStore(state => state.submitAnswer);
    const [value, setValue] = useState('');

    return (
        <Box>
            <Text>Got it? (y/n/skip/q): </Text>
            <TextInput
                value={value}
                onChange={setValue}
                onSubmit={(answer) => {
                    setValue('');
                    submitAnswer(answer);
                }}
            />
        </Box>
    );
};

const DrillSummary: React.FC<{ drill: DrillState; onDone: () => void }> = ({ drill, onDone }) => {
    const { correct, wrong, skipped, cardsSeen, totalCards } = getTallies(drill);

    return (
        <Box flexDirection="column">
            {drill.phase === 'terminated' ? (
                <>
                    <Text bold>Session ended early.</Text>
                    <Text>Correct: {correct}, Wrong: {wrong}, Skipped: {skipped}</Text>
                    <Text dimColor>Seen {cardsSeen} of {totalCards} cards.</Text>
                </>
            ) : (
                <>
                    <Text bold color="green">Done!</Text>
                    <Text>Correct: {correct}</Text>
                    <Text>Wrong:   {wrong}</Text>
                    <Text>Skipped: {skipped}</Text>
                </>
            )}
            <PressEnter onContinue={onDone} />
        </Box>
    );
};

export const LearnView: React.FC<LearnViewProps> = ({ collection, onDone }) => {
    const drill = useAppStore(state => state.drill);
    const cardCount = useAppStore(state => state.registry.collections.get(collection)?.cards.length ?? 0);
    const startDrill = useAppStore(state => state.startDrill);
    const revealCard = useAppStore(state => state.revealCard);
    const endDrill = useAppStore(state => state.endDrill);

    const finish = () => {
        endDrill();
        onDone();
    };

    if (!drill) {
        if (cardCount === 0) {
            return (
                <Box flexDirection="column">
                    <Text>No cards to learn yet.</Text>
                    <PressEnter onContinue={onDone} />
                </Box>
            );
        }

        return (
            <Menu<DrillOrder | 'cancel'>
                title="Learn mode:"
                items={[
                    { label: 'In order', value: 'sequential' },
                    { label: 'Random', value: 'random' },
                    { label: 'Cancel', value: 'cancel' },
                ]}
                onSelect={(value) => {
                    if (value === 'cancel') {
                        onDone();
                    } else if (!startDrill(collection, value)) {
                        onDone();
                    }
                }}
            />
        );
    }

    const card = currentCard(drill);
    if (!card) {
        return <DrillSummary drill={drill} onDone={finish} />;
    }

    return (
        <Box flexDirection="column">
            <Text bold>
                [{drill.collectionName}] Card {drill.index + 1}/{drill.cards.length}  (id: {card.id})
            </Text>
            <Text>{SEPARATOR}</Text>
            <Text color="cyan">FRONT:</Text>
            <Text>{card.front}</Text>
            <Text>{SEPARATOR}</Text>
            {drill.phase === 'presented' ? (
                <PressEnter message="Press Enter to reveal the back..." onContinue={revealCard} />
            ) : (
                <>
                    <Text color="cyan">BACK:</Text>
                    <Text>{card.back}</Text>
                    <Text>{SEPARATOR}</Text>
                    <JudgmentPrompt key={drill.index} />
                    {drill.lastInputRejected && <Text color="yellow">Please enter y, n, skip, or q.</Text>}
                </>
            )}
        </Box>
    );
};
