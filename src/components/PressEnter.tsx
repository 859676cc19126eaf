import React from 'react';
import { Text, useInput } from 'ink';

interface PressEnterProps {
    message?: string;
    onContinue: () => void;
}

export const PressEnter: React.FC<PressEnterProps> = ({ message = 'Press Enter to continue...', onContinue }) => {
    useInput((_input, key) => {
        if (key.return) {
            onContinue();
        }
    });

    return <Text dimColor>{message}</Text>;
};
