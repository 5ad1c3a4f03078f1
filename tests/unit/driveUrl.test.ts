import { extractDriveFileId, fallbackDriveFileName } from '../../services/googleDrive/driveUrl';

describe('Drive URL parsing', () => {
    describe('extractDriveFileId', () => {
        it('should read the path form', () => {
            expect(extractDriveFileId('https://drive.google.com/file/d/ABC123/view')).toBe('ABC123');
        });

        it('should read the query form', () => {
            expect(extractDriveFileId('https://drive.google.com/open?id=XyZ_-9')).toBe('XyZ_-9');
            expect(extractDriveFileId('https://drive.google.com/uc?export=download&id=QQ1')).toBe('QQ1');
        });

        it('should read the short form', () => {
            expect(extractDriveFileId('https://drive.google.com/d/SHORT1')).toBe('SHORT1');
        });

        it('should prefer the path form over the query form', () => {
            expect(extractDriveFileId('https://drive.google.com/file/d/PATHID/view?id=QUERYID')).toBe('PATHID');
        });

        it('should stop the identifier at the first character outside the id alphabet', () => {
            expect(extractDriveFileId('https://drive.google.com/file/d/abc.def/view')).toBe('abc');
        });

        it('should return null when no pattern matches', () => {
            expect(extractDriveFileId('https://drive.google.com/drive/my-drive')).toBeNull();
        });
    });

    describe('fallbackDriveFileName', () => {
        it('should use the first 8 characters of the id', () => {
            expect(fallbackDriveFileName('ABCDEFGHIJK')).toBe('video_ABCDEFGH.mp4');
        });

        it('should use the whole id when it is short', () => {
            expect(fallbackDriveFileName('ABC')).toBe('video_ABC.mp4');
        });
    });
});
