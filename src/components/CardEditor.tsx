import React, { useState } from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import { CardList } from './CardList';
import { PromptInput } from './PromptInput';
import { ConfirmPrompt } from './ConfirmPrompt';
import { PressEnter } from './PressEnter';
import type { Card } from '../domain';

const NO_CARDS: Card[] = [];

interface CardScreenProps {
    collection: string;
    onDone: () => void;
}

/**
 * Add a card: front, then back. Blank answers are re-prompted.
 */
export const AddCardForm: React.FC<CardScreenProps> = ({ collection, onDone }) => {
    const addCard = useAppStore(state => state.addCard);
    const [front, setFront] = useState<string | null>(null);

    if (front === null) {
        return <PromptInput key="front" label="Front: " required onSubmit={setFront} onCancel={onDone} />;
    }

    return (
        <Box flexDirection="column">
            <Text>Front: {front.trim()}</Text>
            <PromptInput
                key="back"
                label="Back: "
                required
                onSubmit={(back) => {
                    addCard(collection, front, back);
                    onDone();
                }}
                onCancel={onDone}
            />
        </Box>
    );
};

type PickStep = { step: 'pick' } | { step: 'missing' } | { step: 'chosen'; card: Card };

/**
 * Shared flow for edit and delete: list the cards, ask for an id.
 */
function useCardPicker(collection: string) {
    const cards = useAppStore(state => state.registry.collections.get(collection)?.cards ?? NO_CARDS);
    const [pick, setPick] = useState<PickStep>({ step: 'pick' });

    const choose = (id: string) => {
        const card = cards.find(c => c.id === id.trim());
        setPick(card ? { step: 'chosen', card } : { step: 'missing' });
    };

    return { cards, pick, choose };
}

export const EditCardForm: React.FC<CardScreenProps> = ({ collection, onDone }) => {
    const editCard = useAppStore(state => state.editCard);
    const { cards, pick, choose } = useCardPicker(collection);
    const [newFront, setNewFront] = useState<string | null>(null);

    if (cards.length === 0 && pick.step === 'pick') {
        return (
            <Box flexDirection="column">
                <Text>No cards to edit.</Text>
                <PressEnter onContinue={onDone} />
            </Box>
        );
    }

    if (pick.step === 'pick') {
        return (
            <Box flexDirection="column">
                <CardList cards={cards} />
                <PromptInput label="Enter card id to edit: " required onSubmit={choose} onCancel={onDone} />
            </Box>
        );
    }

    if (pick.step === 'missing') {
        return (
            <Box flexDirection="column">
                <Text color="red">Card id not found.</Text>
                <PressEnter onContinue={onDone} />
            </Box>
        );
    }

    const { card } = pick;
    return (
        <Box flexDirection="column">
            <Text dimColor>Press Enter to keep the current value.</Text>
            {newFront === null ? (
                <PromptInput key="front" label={`Front [${card.front}]: `} onSubmit={setNewFront} onCancel={onDone} />
            ) : (
                <>
                    <Text>Front [{card.front}]: {newFront}</Text>
                    <PromptInput
                        key="back"
                        label={`Back  [${card.back}]: `}
                        onSubmit={(newBack) => {
                            editCard(collection, card.id, { front: newFront, back: newBack });
                            onDone();
                        }}
                        onCancel={onDone}
                    />
                </>
            )}
        </Box>
    );
};

export const DeleteCardForm: React.FC<CardScreenProps> = ({ collection, onDone }) => {
    const deleteCard = useAppStore(state => state.deleteCard);
    const { cards, pick, choose } = useCardPicker(collection);

    if (cards.length === 0 && pick.step === 'pick') {
        return (
            <Box flexDirection="column">
                <Text>No cards to delete.</Text>
                <PressEnter onContinue={onDone} />
            </Box>
        );
    }

    if (pick.step === 'pick') {
        return (
            <Box flexDirection="column">
                <CardList cards={cards} />
                <PromptInput label="Enter card id to delete: " required onSubmit={choose} onCancel={onDone} />
            </Box>
        );
    }

    if (pick.step === 'missing') {
        return (
            <Box flexDirection="column">
                <Text color="red">Card id not found.</Text>
                <PressEnter onContinue={onDone} />
            </Box>
        );
    }

    const { card } = pick;
    return (
        <ConfirmPrompt
            message={`Delete card ${card.id}?`}
            onConfirm={() => {
                deleteCard(collection, card.id);
                onDone();
            }}
            onCancel={onDone}
        />
    );
};

export const CardListScreen: React.FC<CardScreenProps> = ({ collection, onDone }) => {
    const cards = useAppStore(state => state.registry.collections.get(collection)?.cards ?? NO_CARDS);
    return (
        <Box flexDirection="column">
            <CardList cards={cards} />
            <PressEnter onContinue={onDone} />
        </Box>
    );
};

export const SearchCardsForm: React.FC<CardScreenProps> = ({ collection, onDone }) => {
    const searchCards = useAppStore(state => state.searchCards);
    const cardCount = useAppStore(state => state.registry.collections.get(collection)?.cards.length ?? 0);
    const [results, setResults] = useState<Card[] | null>(null);

    if (cardCount === 0) {
        return (
            <Box flexDirection="column">
                <Text>No cards to search.</Text>
                <PressEnter onContinue={onDone} />
            </Box>
        );
    }

    if (results === null) {
        return (
            <PromptInput
                label="Search text: "
                required
                onSubmit={(query) => setResults(searchCards(collection, query.trim()))}
                onCancel={onDone}
            />
        );
    }

    return (
        <Box flexDirection="column">
            <CardList cards={results} heading="Matches" emptyText="No matches." />
            <PressEnter onContinue={onDone} />
        </Box>
    );
};
