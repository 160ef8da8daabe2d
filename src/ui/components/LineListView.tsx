import { useEffect, useRef } from 'react';
import type { AnimationData } from '@/core/models/AnimationData';

interface LineListViewProps {
    data: AnimationData;
    scrollOffset: number;
    activeLineIndex: number | null;
    manualScroll: boolean;
}

function formatTime(seconds: number): string {
    return seconds.toFixed(2).padStart(6, ' ');
}

export function LineListView({ data, scrollOffset, activeLineIndex, manualScroll }: LineListViewProps) {
    const containerRef = useRef<HTMLDivElement>(null);

    useEffect(() => {
        const el = containerRef.current?.children[scrollOffset];
        if (el) {
            el.scrollIntoView({ behavior: 'smooth', block: 'center' });
        }
    }, [scrollOffset]);

    if (data.lines.length === 0) {
        return <div style={{ color: '#555', textAlign: 'center', marginTop: '40px' }}>No lines</div>;
    }

    return (
        <div ref={containerRef} style={{ fontFamily: 'monospace', textAlign: 'left' }}>
            {data.lines.map((line, idx) => {
                const isActive = idx === activeLineIndex;
                const isScrolled = idx === scrollOffset;
                return (
                    <div
                        key={idx}
                        style={{
                            padding: '6px 10px',
                            color: isActive ? '#4caf50' : '#888',
                            fontWeight: isActive ? 'bold' : 'normal',
                            background: isScrolled && manualScroll ? '#333' : 'transparent',
                            borderBottom: '1px solid #222',
                            whiteSpace: 'pre'
                        }}
                    >
                        <span style={{ color: '#555', marginRight: '10px' }}>
                            [{formatTime(line.start)} - {formatTime(line.end)}]
                        </span>
                        {line.part !== undefined && <span style={{ color: '#ff9800', marginRight: '8px' }}>[{line.part}]</span>}
                        {line.text}
                    </div>
                );
            })}
        </div>
    );
}
