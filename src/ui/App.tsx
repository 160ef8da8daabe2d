import { useEffect, useState, useRef } from 'react';
import { EditSession } from '@/core/services/EditSession';
import type { SessionState } from '@/core/session/SessionState';
import type { KeyInput } from '@/core/session/Keymap';
import { activeLineIndex, modeHint, modeLabel } from '@/core/session/SessionSelectors';
import { Logger, type LogEntry } from '@/core/utils/Logger';
import { DocumentModal } from './components/DocumentModal';
import { LineListView } from './components/LineListView';
import { FocusLineView } from './components/FocusLineView';
import { TextEditView } from './components/TextEditView';

// Singleton instance for the app
const session = new EditSession();
const compileSession = () => session.compile();

function toKeyInput(e: KeyboardEvent): KeyInput {
    return {
        key: e.key,
        ctrl: e.ctrlKey,
        alt: e.altKey,
        meta: e.metaKey,
        kind: e.repeat ? 'repeat' : 'press',
    };
}

export default function App() {
    const [state, setState] = useState<SessionState>(session.getState());
    const [logs, setLogs] = useState<readonly LogEntry[]>(Logger.getHistory());
    const [showDocument, setShowDocument] = useState(false);
    const [finalDocument, setFinalDocument] = useState<string | null>(null);

    const logContainerRef = useRef<HTMLDivElement>(null);
    const showDocumentRef = useRef(false);
    showDocumentRef.current = showDocument;

    useEffect(() => session.subscribe(setState), []);

    // Subscribe to Logger
    useEffect(() => {
        return Logger.subscribe(() => setLogs(Logger.getHistory()));
    }, []);

    // Auto-scroll logs
    useEffect(() => {
        if (logContainerRef.current) {
            logContainerRef.current.scrollTop = logContainerRef.current.scrollHeight;
        }
    }, [logs]);

    // Tick loop, stopped once the session has ended
    useEffect(() => {
        if (finalDocument !== null) return;

        let frame = requestAnimationFrame(function loop(now: number) {
            session.update(now);
            frame = requestAnimationFrame(loop);
        });
        return () => cancelAnimationFrame(frame);
    }, [finalDocument]);

    // Keyboard input
    useEffect(() => {
        if (finalDocument !== null) return;

        const onKeyDown = (e: KeyboardEvent) => {
            if (showDocumentRef.current) return;
            // Leave browser shortcuts alone apart from undo
            if ((e.ctrlKey || e.metaKey) && e.key.toLowerCase() !== 'z') return;

            e.preventDefault();
            const signal = session.handleKey(toKeyInput(e));

            if (signal === 'export') {
                setShowDocument(true);
            } else if (signal === 'quit') {
                const compiled = session.compile();
                Logger.info(`[App] Session ended with ${session.getState().data.lines.length} lines`);
                console.log(compiled);
                setFinalDocument(compiled);
            }
        };

        window.addEventListener('keydown', onKeyDown);
        return () => window.removeEventListener('keydown', onKeyDown);
    }, [finalDocument]);

    const hint = modeHint(state);

    return (
        <div className="app-container" style={{ padding: '20px', maxWidth: '800px', margin: '0 auto', textAlign: 'center' }}>
            <h1>Lyric Keyframe Studio</h1>

            {finalDocument !== null ? (
                <div style={{ textAlign: 'left' }}>
                    <p style={{ color: '#aaa' }}>Session ended. Final document:</p>
                    <pre style={{ background: '#1a1a1a', border: '1px solid #444', padding: '20px', whiteSpace: 'pre-wrap' }}>
                        {finalDocument}
                    </pre>
                </div>
            ) : (
                <>
                    {/* Header */}
                    <div style={{ display: 'flex', justifyContent: 'space-between', color: '#aaa', marginBottom: '10px', fontFamily: 'monospace' }}>
                        <span>{modeLabel(state)}</span>
                        <span>
                            {state.isPlaying ? '▶' : '⏸'} {state.currentTime.toFixed(2)}s
                        </span>
                    </div>
                    {hint && <div style={{ color: '#ff9800', marginBottom: '10px', fontSize: '0.9em' }}>{hint}</div>}

                    {/* Main view */}
                    <div
                        className="lyrics-view no-scrollbar"
                        style={{
                            height: '400px',
                            overflowY: 'auto',
                            border: '1px solid #444',
                            background: '#1a1a1a',
                            padding: '20px',
                            borderRadius: '8px'
                        }}
                    >
                        {state.viewMode === 'list' && (
                            <LineListView
                                data={state.data}
                                scrollOffset={state.scrollOffset}
                                activeLineIndex={activeLineIndex(state)}
                                manualScroll={state.manualScroll}
                            />
                        )}
                        {state.viewMode === 'focus' && (
                            <FocusLineView state={state} config={session.getConfig()} />
                        )}
                        {state.viewMode === 'textEdit' && (
                            <TextEditView
                                data={state.data}
                                focusLineIndex={state.focusLineIndex}
                                cursorCol={state.cursorCol}
                            />
                        )}
                    </div>

                    <div style={{ marginTop: '10px' }}>
                        <button onClick={() => setShowDocument(true)}>Document [S]</button>
                    </div>
                </>
            )}

            {/* Logs Viewer */}
            <div className="log-viewer" style={{
                marginTop: '20px',
                textAlign: 'left',
                border: '1px solid #333',
                background: '#111',
                padding: '10px',
                borderRadius: '4px'
            }}>
                <div style={{ fontSize: '0.8em', color: '#888', borderBottom: '1px solid #333', marginBottom: '5px', paddingBottom: '2px' }}>
                    Application Logs (Latest 100)
                </div>
                <div
                    ref={logContainerRef}
                    style={{ maxHeight: '150px', overflowY: 'auto', fontFamily: 'monospace', fontSize: '12px' }}
                >
                    {logs.map((log, i) => (
                        <div key={i} style={{ color: log.level === 'error' ? '#f44336' : log.level === 'warn' ? '#ff9800' : '#8bc34a', marginBottom: '2px' }}>
                            <span style={{ color: '#555', marginRight: '5px' }}>[{new Date(log.timestamp).toLocaleTimeString()}]</span>
                            <span style={{ fontWeight: 'bold', marginRight: '5px' }}>[{log.level.toUpperCase()}]</span>
                            {log.message}
                            {log.data !== undefined && <span style={{ color: '#aaa', marginLeft: '5px' }}>{JSON.stringify(log.data)}</span>}
                        </div>
                    ))}
                    {logs.length === 0 && <div style={{ color: '#555', fontStyle: 'italic' }}>No logs yet...</div>}
                </div>
            </div>

            <DocumentModal
                isOpen={showDocument}
                onClose={() => setShowDocument(false)}
                compile={compileSession}
                onLoad={(text) => session.load(text)}
            />
        </div>
    );
}
