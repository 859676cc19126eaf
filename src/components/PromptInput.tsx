import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';

interface PromptInputProps {
    label: string;
    /** Re-prompt on blank input instead of submitting it */
    required?: boolean;
    onSubmit: (value: string) => void;
    onCancel?: () => void;
}

export const PromptInput: React.FC<PromptInputProps> = ({ label, required = false, onSubmit, onCancel }) => {
    const [value, setValue] = useState('');
    const [showEmptyError, setShowEmptyError] = useState(false);

    useInput((_input, key) => {
        if (key.escape && onCancel) {
            onCancel();
        }
    });

    const handleSubmit = (submitted: string) => {
        if (required && !submitted.trim()) {
            setShowEmptyError(true);
            setValue('');
            return;
        }
        onSubmit(submitted);
    };

    return (
        <Box flexDirection="column">
            <Box>
                <Text>{label}</Text>
                <TextInput
                    value={value}
                    onChange={(next) => {
                        setValue(next);
                        setShowEmptyError(false);
                    }}
                    onSubmit={handleSubmit}
                />
            </Box>
            {showEmptyError && <Text color="yellow">Input cannot be empty.</Text>}
        </Box>
    );
};
