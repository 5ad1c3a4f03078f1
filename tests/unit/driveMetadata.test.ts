import { buildArtifactName, resolveDriveFileName } from '../../services/googleDrive/driveMetadata';

const mockFilesGet = jest.fn();

jest.mock('googleapis', () => ({
    google: {
        drive: jest.fn(() => ({ files: { get: mockFilesGet } }))
    }
}));

describe('Drive metadata', () => {
    describe('resolveDriveFileName', () => {
        it('should return the display name when Drive provides one', async () => {
            mockFilesGet.mockResolvedValue({ status: 200, data: { name: 'Trip.mov', size: '42' } });

            const name = await resolveDriveFileName('ABC123456789');

            expect(name).toBe('Trip.mov');
            expect(mockFilesGet).toHaveBeenCalledWith({
                fileId: 'ABC123456789',
                fields: 'name,size',
                supportsAllDrives: true
            });
        });

        it('should fall back to a synthetic name when the lookup is refused', async () => {
            mockFilesGet.mockRejectedValue(new Error('Request failed with status code 403'));

            expect(await resolveDriveFileName('ABC123456789')).toBe('video_ABC12345.mp4');
        });

        it('should fall back when the name field is missing', async () => {
            mockFilesGet.mockResolvedValue({ status: 200, data: { size: '42' } });

            expect(await resolveDriveFileName('ZZZZZZZZZZ')).toBe('video_ZZZZZZZZ.mp4');
        });
    });

    describe('buildArtifactName', () => {
        it('should sanitize the base and keep the original extension', () => {
            expect(buildArtifactName('My Trip (2023).final.mov', 'ID')).toEqual({
                safeBase: 'My_Trip__2023__final',
                extension: '.mov',
                fileName: 'My_Trip__2023__final.mov'
            });
        });

        it('should default the extension to .mp4', () => {
            expect(buildArtifactName('recording', 'ID')).toEqual({
                safeBase: 'recording',
                extension: '.mp4',
                fileName: 'recording.mp4'
            });
        });

        it('should keep the synthetic name intact', () => {
            expect(buildArtifactName('video_ABC12345.mp4', 'ABC123456789').fileName).toBe('video_ABC12345.mp4');
        });

        it('should fall back to an id-based base when nothing usable remains', () => {
            expect(buildArtifactName('', 'ABCDEFGHIJ')).toEqual({
                safeBase: 'video_ABCDEFGH',
                extension: '.mp4',
                fileName: 'video_ABCDEFGH.mp4'
            });
        });

        it('should cap the base at 50 characters', () => {
            const { safeBase } = buildArtifactName(`${'x'.repeat(70)}.mp4`, 'ID');
            expect(safeBase).toBe('x'.repeat(50));
        });
    });
});
