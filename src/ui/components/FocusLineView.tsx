import type { SessionState } from '@/core/session/SessionState';
import type { EditorConfig } from '@/core/config/EditorConfig';
import {
    charHighlights,
    displayLineIndex,
    editModeLabel,
    headerRelativeTime,
    keyframeLabels,
} from '@/core/session/SessionSelectors';
import { PlaybackSynchronizer } from '@/core/services/PlaybackSynchronizer';
import { lineDuration } from '@/core/models/Timeline';

const synchronizer = new PlaybackSynchronizer();

interface FocusLineViewProps {
    state: SessionState;
    config: EditorConfig;
}

/**
 * Single-line view with the per-character highlight and keyframe strip.
 */
export function FocusLineView({ state, config }: FocusLineViewProps) {
    const idx = displayLineIndex(state);
    if (idx === null) {
        return <div style={{ color: '#555', textAlign: 'center', marginTop: '40px' }}>Between lines</div>;
    }

    const line = state.data.lines[idx];
    const duration = lineDuration(line);
    const progress = synchronizer.calculateLineProgress(line, state.currentTime);

    return (
        <div style={{ textAlign: 'center' }}>
            <div style={{ color: '#888', fontSize: '0.9em', marginBottom: '10px' }}>
                Line {idx + 1} | {headerRelativeTime(state).toFixed(2)}s / {duration.toFixed(2)}s
                <span style={{ marginLeft: '10px', color: state.editMode === 'time' ? '#03a9f4' : '#e91e63' }}>
                    {editModeLabel(state)}
                </span>
            </div>

            <div style={{ fontSize: '2em', margin: '30px 0', whiteSpace: 'pre' }}>
                {charHighlights(line, state.currentTime, config).map((c, i) => (
                    <span
                        key={i}
                        style={{
                            color: c.played ? '#4caf50' : '#fff',
                            opacity: c.played ? 1 : 0.4 + 0.6 * c.glow,
                            transition: 'color 0.05s linear'
                        }}
                    >
                        {c.char}
                    </span>
                ))}
            </div>

            <div style={{ height: '4px', background: '#333', marginBottom: '20px' }}>
                <div style={{ width: `${progress * 100}%`, height: '100%', background: '#4caf50' }} />
            </div>

            <div style={{ display: 'flex', flexWrap: 'wrap', gap: '8px', justifyContent: 'center', fontFamily: 'monospace' }}>
                {keyframeLabels(state, idx, config).map((kf, i) => (
                    <span
                        key={i}
                        style={{
                            padding: '2px 6px',
                            borderRadius: '4px',
                            border: kf.isActive ? '1px solid #ffeb3b' : '1px solid #444',
                            color: kf.isNear ? '#ffeb3b' : '#aaa',
                            fontWeight: kf.isActive ? 'bold' : 'normal'
                        }}
                    >
                        {kf.label}
                    </span>
                ))}
            </div>
        </div>
    );
}
