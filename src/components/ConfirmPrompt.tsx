import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface ConfirmPromptProps {
    message: string;
    onConfirm: () => void;
    onCancel: () => void;
}

export function parseConfirmation(input: string): boolean | null {
    const answer = input.trim().toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    return null;
}

export const ConfirmPrompt: React.FC<ConfirmPromptProps> = ({ message, onConfirm, onCancel }) => {
    const [value, setValue] = useState('');
    const [invalid, setInvalid] = useState(false);

    const handleSubmit = (submitted: string) => {
        const confirmed = parseConfirmation(submitted);
        if (confirmed === null) {
            setInvalid(true);
            setValue('');
            return;
        }
        if (confirmed) {
            onConfirm();
        } else {
            onCancel();
        }
    };

    return (
        <Box flexDirection="column">
            <Box>
                <Text color="red">{message} (y/n): </Text>
                <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} />
            </Box>
            {invalid && <Text color="yellow">Please type y or n.</Text>}
        </Box>
    );
};
