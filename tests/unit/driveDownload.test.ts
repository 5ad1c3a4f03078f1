import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import {
    createProgressLogger,
    DownloadProgress,
    downloadDriveFile
} from '../../services/googleDrive/driveDownload';
import { DriveByteSource } from '../../services/googleDrive/driveByteSource';
import logger from '../../utils/logger';

function sourceOf(chunks: string[], totalBytes: number): DriveByteSource {
    return {
        open: jest.fn().mockResolvedValue({
            stream: Readable.from(chunks.map(chunk => Buffer.from(chunk))),
            totalBytes
        })
    };
}

describe('downloadDriveFile', () => {
    let tmpDir: string;

    beforeAll(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drive-download-'));
    });

    afterAll(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should write the stream to disk and report progress', async () => {
        const outputPath = path.join(tmpDir, 'clip.mp4');
        const source = sourceOf(['abc', 'defg'], 7);
        const progress: DownloadProgress[] = [];

        const ok = await downloadDriveFile('FILE1', outputPath, source, p => progress.push(p));

        expect(ok).toBe(true);
        expect(source.open).toHaveBeenCalledWith('FILE1');
        expect(fs.readFileSync(outputPath, 'utf8')).toBe('abcdefg');
        expect(progress.map(p => p.downloadedBytes)).toEqual([3, 7]);
        expect(progress[1].percent).toBe(100);
    });

    it('should report no percentage when the length is unknown', async () => {
        const outputPath = path.join(tmpDir, 'unknown.mp4');
        const progress: DownloadProgress[] = [];

        const ok = await downloadDriveFile('FILE2', outputPath, sourceOf(['xy'], 0), p => progress.push(p));

        expect(ok).toBe(true);
        expect(progress).toEqual([{ downloadedBytes: 2, totalBytes: 0, percent: null }]);
    });

    it('should return false when the source cannot be opened', async () => {
        const source: DriveByteSource = { open: jest.fn().mockRejectedValue(new Error('boom')) };

        const ok = await downloadDriveFile('FILE3', path.join(tmpDir, 'never.mp4'), source, () => undefined);

        expect(ok).toBe(false);
        expect(logger.error).toHaveBeenCalledWith('❌ Error downloading: boom', { fileId: 'FILE3' });
    });

    it('should return false when the stream fails midway', async () => {
        const failing = new Readable({
            read() {
                this.destroy(new Error('socket hang up'));
            }
        });
        const source: DriveByteSource = { open: jest.fn().mockResolvedValue({ stream: failing, totalBytes: 10 }) };

        const ok = await downloadDriveFile('FILE4', path.join(tmpDir, 'partial.mp4'), source, () => undefined);

        expect(ok).toBe(false);
        expect(logger.error).toHaveBeenCalledWith('❌ Error downloading: socket hang up', { fileId: 'FILE4' });
    });
});

describe('createProgressLogger', () => {
    it('should log once per step', () => {
        const report = createProgressLogger(10);

        report({ downloadedBytes: 1, totalBytes: 100, percent: 1 });
        report({ downloadedBytes: 5, totalBytes: 100, percent: 5 });
        report({ downloadedBytes: 12, totalBytes: 100, percent: 12 });
        report({ downloadedBytes: 12, totalBytes: 0, percent: null });

        expect(logger.info).toHaveBeenCalledTimes(2);
        expect(logger.info).toHaveBeenNthCalledWith(1, '⏬ Download progress: 1.0% (0.0/0.0 MB)');
    });
});
