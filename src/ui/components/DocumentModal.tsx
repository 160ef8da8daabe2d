import React, { useEffect, useState } from 'react';
import type { DecodeResult } from '@/core/interfaces/AnimationCodec';
import { DocumentFormatError } from '@/core/errors';

interface DocumentModalProps {
    isOpen: boolean;
    onClose: () => void;
    /** Compiles the current session; called once each time the panel opens */
    compile: () => string;
    onLoad: (document: string) => DecodeResult;
}

function describeError(error: Error): string {
    if (error instanceof DocumentFormatError) {
        return `${error.message} (${error.reason})`;
    }
    return error.message;
}

export const DocumentModal: React.FC<DocumentModalProps> = ({ isOpen, onClose, compile, onLoad }) => {
    const [document, setDocument] = useState("");
    const [draft, setDraft] = useState("");
    const [status, setStatus] = useState("");
    const [copied, setCopied] = useState(false);

    // Refresh the draft each time the panel opens
    useEffect(() => {
        if (!isOpen) return;
        const compiled = compile();
        setDocument(compiled);
        setDraft(compiled);
        setStatus("");
        setCopied(false);
    }, [isOpen, compile]);

    if (!isOpen) return null;

    const handleCopy = async () => {
        try {
            await navigator.clipboard.writeText(document);
            setCopied(true);
        } catch (e) {
            setStatus(`Copy failed: ${e instanceof Error ? e.message : String(e)}`);
        }
    };

    const handleLoad = () => {
        const result = onLoad(draft);
        if (result.ok) {
            setStatus(`Loaded ${result.data.lines.length} lines.`);
            onClose();
        } else {
            setStatus(describeError(result.error));
        }
    };

    const handleFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
        const file = e.target.files?.[0];
        if (!file) return;
        try {
            setDraft(await file.text());
        } catch (err) {
            setStatus(`Could not read ${file.name}: ${err instanceof Error ? err.message : String(err)}`);
        }
    };

    return (
        <div
            onClick={onClose}
            style={{
                position: 'fixed', top: 0, left: 0, width: '100%', height: '100%',
                background: 'rgba(0,0,0,0.5)', zIndex: 999
            }}
        >
            <div
                onClick={(e) => e.stopPropagation()}
                style={{
                    position: 'fixed', top: '10%', left: '50%', transform: 'translate(-50%, 0)',
                    background: '#222', border: '1px solid #666', padding: '20px', zIndex: 1000,
                    width: '640px', borderRadius: '8px', boxShadow: '0 4px 10px rgba(0,0,0,0.5)',
                    textAlign: 'left'
                }}
            >
                <h3 style={{ marginTop: 0 }}>Keyframe Document</h3>
                <textarea
                    value={draft}
                    onChange={e => setDraft(e.target.value)}
                    spellCheck={false}
                    style={{
                        width: '100%', height: '260px', boxSizing: 'border-box',
                        fontFamily: 'monospace', fontSize: '12px', background: '#111', color: '#ddd'
                    }}
                />
                <div style={{ display: 'flex', gap: '10px', marginTop: '10px', alignItems: 'center' }}>
                    <button onClick={handleCopy}>{copied ? 'Copied' : 'Copy'}</button>
                    <button onClick={handleLoad}>Load</button>
                    <input type="file" accept=".txt,.lsk" onChange={handleFile} />
                    <button onClick={onClose} style={{ marginLeft: 'auto' }}>Close</button>
                </div>
                {status && <div style={{ marginTop: '10px', color: '#ff9800', fontSize: '0.9em' }}>{status}</div>}
            </div>
        </div>
    );
};
