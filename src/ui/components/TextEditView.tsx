import type { AnimationData } from '@/core/models/AnimationData';
import { sliceChars } from '@/core/utils/TextMetrics';

interface TextEditViewProps {
    data: AnimationData;
    focusLineIndex: number | null;
    cursorCol: number;
}

export function TextEditView({ data, focusLineIndex, cursorCol }: TextEditViewProps) {
    return (
        <div style={{ fontFamily: 'monospace', textAlign: 'left' }}>
            {data.lines.map((line, idx) => {
                if (idx !== focusLineIndex) {
                    return (
                        <div key={idx} style={{ padding: '4px 10px', color: '#666', whiteSpace: 'pre' }}>
                            {line.text}
                        </div>
                    );
                }

                const before = sliceChars(line.text, 0, cursorCol);
                const at = sliceChars(line.text, cursorCol, cursorCol + 1);
                const after = sliceChars(line.text, cursorCol + 1);
                return (
                    <div key={idx} style={{ padding: '4px 10px', color: '#fff', background: '#222', whiteSpace: 'pre' }}>
                        {before}
                        <span style={{ background: '#fff', color: '#000' }}>{at || ' '}</span>
                        {after}
                    </div>
                );
            })}
        </div>
    );
}
