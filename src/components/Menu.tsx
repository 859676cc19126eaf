import React from 'react';
import { Box, Text } from 'ink';
import SelectInput from 'ink-select-input';

export interface MenuItem<V extends string> {
    label: string;
    value: V;
}

interface MenuProps<V extends string> {
    title?: string;
    items: MenuItem<V>[];
    onSelect: (value: V) => void;
}

export function Menu<V extends string>({ title, items, onSelect }: MenuProps<V>) {
    return (
        <Box flexDirection="column">
            {title && <Text>{title}</Text>}
            <SelectInput
                items={items.map(item => ({ key: item.value, label: item.label, value: item.value }))}
                onSelect={item => onSelect(item.value)}
            />
        </Box>
    );
}
