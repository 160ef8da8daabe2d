import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { createElement } from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { act } from 'react-dom/test-utils';
import { DocumentModal } from './DocumentModal';
import type { DecodeResult } from '@/core/interfaces/AnimationCodec';
import { DocumentFormatError } from '@/core/errors';

describe('DocumentModal', () => {
    let container: HTMLDivElement;
    let root: Root;

    beforeAll(() => {
        Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);
    });

    beforeEach(() => {
        container = document.createElement('div');
        document.body.appendChild(container);
        root = createRoot(container);
    });

    afterEach(() => {
        act(() => root.unmount());
        container.remove();
    });

    const rejected = (): DecodeResult => ({
        ok: false,
        error: new DocumentFormatError('MISSING_SEPARATOR', 'Missing [//] separator'),
    });

    it('should only compile the document while open', () => {
        const compile = vi.fn(() => 'doc-text');
        const render = (isOpen: boolean) => act(() => {
            root.render(createElement(DocumentModal, { isOpen, onClose: () => undefined, compile, onLoad: rejected }));
        });

        render(false);
        render(false);
        expect(compile).not.toHaveBeenCalled();
        expect(container.querySelector('textarea')).toBeNull();

        render(true);
        render(true);
        expect(compile).toHaveBeenCalledTimes(1);
        expect(container.querySelector('textarea')?.value).toBe('doc-text');
    });

    it('should show why a document was rejected', () => {
        const onLoad = vi.fn(rejected);
        const onClose = vi.fn();
        act(() => {
            root.render(createElement(DocumentModal, { isOpen: true, onClose, compile: () => 'doc-text', onLoad }));
        });

        const load = Array.from(container.querySelectorAll('button')).find(b => b.textContent === 'Load');
        act(() => load?.click());

        expect(onLoad).toHaveBeenCalledWith('doc-text');
        expect(onClose).not.toHaveBeenCalled();
        expect(container.textContent).toContain('Format error: Missing [//] separator (MISSING_SEPARATOR)');
    });
});
