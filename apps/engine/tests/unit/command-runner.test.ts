import { ChildProcess, spawn } from 'child_process';
import { CommandFailedError } from '../../src/errors';
import { runCommand } from '../../src/worker/command-runner';

jest.mock('child_process', () => ({ spawn: jest.fn() }));

const spawnMock = jest.mocked(spawn);

const { ChildProcess: RealChildProcess } = jest.requireActual<typeof import('child_process')>('child_process');

// An unspawned ChildProcess: the runner only listens for its events
function fakeChild(): ChildProcess {
    const child = new RealChildProcess();
    spawnMock.mockReturnValueOnce(child);
    return child;
}

describe('runCommand', () => {
    afterEach(() => {
        spawnMock.mockReset();
    });

    it('spawns argv[0] with the remaining arguments and no shell', async () => {
        const child = fakeChild();
        const running = runCommand(['taskfleet', 'tasks', 'run', 'wf', 'load']);
        child.emit('close', 0, null);

        await expect(running).resolves.toBeUndefined();
        expect(spawnMock).toHaveBeenCalledWith(
            'taskfleet',
            ['tasks', 'run', 'wf', 'load'],
            expect.objectContaining({ stdio: 'inherit' }),
        );
    });

    it('rejects with the exit code', async () => {
        const child = fakeChild();
        const running = runCommand(['false']);
        child.emit('close', 1, null);

        await expect(running).rejects.toEqual(new CommandFailedError(1, null));
    });

    it('rejects with the terminating signal', async () => {
        const child = fakeChild();
        const running = runCommand(['sleep', '60']);
        child.emit('close', null, 'SIGKILL');

        await expect(running).rejects.toThrow('Command terminated by signal SIGKILL');
    });

    it('rejects when the executable cannot start', async () => {
        const child = fakeChild();
        const running = runCommand(['missing-binary']);
        child.emit('error', new Error('spawn missing-binary ENOENT'));

        await expect(running).rejects.toThrow('spawn missing-binary ENOENT');
    });

    it('rejects an empty command without spawning', async () => {
        await expect(runCommand([])).rejects.toThrow('Cannot run an empty command');
        expect(spawnMock).not.toHaveBeenCalled();
    });
});
