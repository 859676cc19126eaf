import React from 'react';
import { Box, Text } from 'ink';
import { useAppStore } from '../store/useAppStore';
import type { NoticeType } from '../types';

const colors: Record<NoticeType, string> = {
    success: 'green',
    error: 'red',
};

const icons: Record<NoticeType, string> = {
    success: '✔',
    error: '✖',
};

export const NoticeBar: React.FC = () => {
    const notice = useAppStore(state => state.notice);

    if (!notice) return null;

    return (
        <Box flexDirection="column" marginTop={1}>
            <Text color={colors[notice.type]}>
                {icons[notice.type]} {notice.title}
            </Text>
            {notice.message && <Text dimColor>  {notice.message}</Text>}
        </Box>
    );
};
