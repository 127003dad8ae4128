import { describe, it, expect, vi } from 'vitest';
import {
    findOtherInstances,
    instancePattern,
    killOtherInstances,
    type ProcessSearch,
} from '../../../src/supervisor/instances.js';

describe('instancePattern', () => {
    const pattern = new RegExp(instancePattern('status-bar', 'tmux'));

    it('should build the pgrep pattern for a target', () => {
        expect(instancePattern('status-bar', 'tmux')).toBe('([^ ]+/)?status-bar +run +tmux( .*)?$');
    });

    it('should escape regex characters in the script name', () => {
        expect(instancePattern('index.js', 'dwm')).toBe('([^ ]+/)?index\\.js +run +dwm( .*)?$');
    });

    it('should match instances for the same target only', () => {
        expect(pattern.test('node /usr/local/bin/status-bar run tmux')).toBe(true);
        expect(pattern.test('node /usr/local/bin/status-bar run tmux volume battery')).toBe(true);
        expect(pattern.test('node /usr/local/bin/status-bar run tmuxx')).toBe(false);
        expect(pattern.test('status-bar run dwm')).toBe(false);
        expect(pattern.test('status-bar trigger tmux')).toBe(false);
    });
});

describe('findOtherInstances', () => {
    it('should search by user and pattern and leave out the current process', async () => {
        const search = vi.fn<ProcessSearch>().mockResolvedValue([100, 200, 300]);

        const pids = await findOtherInstances('tmux', { scriptName: 'status-bar', pid: 200, user: 'alice', search });

        expect(pids).toEqual([100, 300]);
        expect(search).toHaveBeenCalledWith(['-u', 'alice', '-f', instancePattern('status-bar', 'tmux')]);
    });

    it('should match the installed command name by default', async () => {
        const search = vi.fn<ProcessSearch>().mockResolvedValue([]);

        await findOtherInstances('tmux', { pid: 1, user: 'alice', search });

        expect(search).toHaveBeenCalledWith(['-u', 'alice', '-f', '([^ ]+/)?status-bar +run +tmux( .*)?$']);
    });

    it('should search every user when none is known', async () => {
        const search = vi.fn<ProcessSearch>().mockResolvedValue([]);

        await findOtherInstances('dwm', { scriptName: 'status-bar', pid: 1, user: '', search });

        expect(search).toHaveBeenCalledWith(['-f', instancePattern('status-bar', 'dwm')]);
    });
});

describe('killOtherInstances', () => {
    it('should send SIGINT to every other instance', async () => {
        const kill = vi.fn();
        const search: ProcessSearch = async () => [100, 200, 300];

        const killed = await killOtherInstances('tmux', { scriptName: 'status-bar', pid: 200, user: 'alice', search, kill });

        expect(killed).toEqual([100, 300]);
        expect(kill.mock.calls).toEqual([
            [100, 'SIGINT'],
            [300, 'SIGINT'],
        ]);
    });
});
