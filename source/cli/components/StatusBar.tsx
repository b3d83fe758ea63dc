/**
 * StatusBar Component
 *
 * Left: what the foreground is doing. Right: the background worker, if any.
 */

import React, {useState, useEffect} from 'react';
import {Box, Text} from 'ink';
import {formatElapsed} from '../../library/index.js';
import type {AppStatus, BackgroundStatus} from '../types.js';

type Props = {
	status: AppStatus;
	background: BackgroundStatus;
};

/** Braille dots spinner frames */
const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

function Spinner({color}: {color: string}): React.ReactElement {
	const [frame, setFrame] = useState(0);

	useEffect(() => {
		const timer = setInterval(() => {
			setFrame(f => (f + 1) % SPINNER_FRAMES.length);
		}, 80);
		return () => clearInterval(timer);
	}, []);

	return <Text color={color}>{SPINNER_FRAMES[frame]} </Text>;
}

function ProgressBar({
	percent,
	width = 20,
}: {
	percent: number;
	width?: number;
}): React.ReactElement {
	const filled = Math.round((percent / 100) * width);
	return (
		<Text>
			<Text color="cyan">{'█'.repeat(filled)}</Text>
			<Text dimColor>{'░'.repeat(width - filled)}</Text>
		</Text>
	);
}

export function formatStatus(status: AppStatus): {
	text: string;
	color: string;
	showSpinner: boolean;
} {
	switch (status.state) {
		case 'ready':
			return {text: 'Ready', color: 'green', showSpinner: false};
		case 'indexing':
			return {
				text: status.total > 0 ? `Indexing ${status.current}/${status.total}` : 'Indexing',
				color: 'cyan',
				showSpinner: true,
			};
		case 'searching':
			return {text: 'Searching', color: 'cyan', showSpinner: true};
		case 'working':
			return {text: status.message, color: 'cyan', showSpinner: true};
		case 'warning':
			return {text: status.message, color: 'yellow', showSpinner: false};
	}
}

/**
 * "⏳ Indexing 3/40 · 12s" for a running worker, or null.
 */
export function formatBackground(background: BackgroundStatus): string | null {
	if (!background) return null;
	const progress =
		background.current !== null && background.total !== null
			? ` ${background.current}/${background.total}`
			: '';
	return `⏳ Indexing${progress} · ${formatElapsed(background.elapsedMs)}`;
}

export default function StatusBar({status, background}: Props) {
	const {text, color, showSpinner} = formatStatus(status);
	const backgroundText = formatBackground(background);
	const percent =
		status.state === 'indexing' && status.total > 0
			? Math.round((status.current / status.total) * 100)
			: null;

	return (
		<Box paddingX={1} justifyContent="space-between">
			<Box>
				{showSpinner && <Spinner color={color} />}
				<Text color={color}>{text}</Text>
				{percent !== null && (
					<>
						<Text> [</Text>
						<ProgressBar percent={percent} />
						<Text>] {percent}%</Text>
					</>
				)}
			</Box>
			{backgroundText && <Text dimColor>{backgroundText}</Text>}
		</Box>
	);
}
