import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../logger';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes messages at or above its level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const log = new Logger('codec', 'info');
        log.info('hello');
        log.debug('hidden');
        expect(debug).not.toHaveBeenCalled();
        expect(info).toHaveBeenCalledTimes(1);
        expect(info.mock.calls[0][0]).toMatch(/^\[.+\] \[codec\] \[INFO\] hello$/);
    });

    it('is silent at level none', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const log = new Logger('quiet', 'none');
        log.error('nope');
        expect(error).not.toHaveBeenCalled();
    });

    it('tags child loggers with the parent name', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        new Logger('parent', 'warn').child('kid').warn('careful');
        expect(warn.mock.calls[0][0]).toContain('[parent:kid] [WARN] careful');
    });

    it('follows the parent level until given its own', () => {
        const parent = new Logger('parent', 'warn');
        const kid = parent.child('kid');
        expect(kid.getLevel()).toBe('warn');
        parent.setLevel('debug');
        expect(kid.getLevel()).toBe('debug');
        kid.setLevel('error');
        parent.setLevel('info');
        expect(kid.getLevel()).toBe('error');
    });

    it('defaults to info', () => {
        expect(new Logger('plain').getLevel()).toBe('info');
    });
});
