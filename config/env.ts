import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

type Environment = 'development' | 'production' | 'test';

interface Env {
    env: Environment;
    logLevel: string;
    enableFileLogging: boolean;
    logDir: string;

    github: {
        token: string;
        repoName: string;
    };

    googleDriveApiKey: string;

    driveFile: string;
    tempDir: string;
    uploadTimeoutMs: number;
}

const getEnv = (key: string, defaultValue: string = ''): string => {
    const value = process.env[key];
    return value || defaultValue;
};

const parseEnvironment = (value: string | undefined): Environment => {
    if (value === 'production' || value === 'test') {
        return value;
    }
    return 'development';
};

const env: Env = {
    env: parseEnvironment(process.env.NODE_ENV),
    logLevel: getEnv('LOG_LEVEL', 'info'),
    enableFileLogging: process.env.ENABLE_FILE_LOGGING === 'true',
    logDir: getEnv('LOG_DIR', path.join(process.cwd(), 'logs')),

    github: {
        token: getEnv('GITHUB_TOKEN'),
        repoName: getEnv('REPO_NAME'),
    },

    googleDriveApiKey: getEnv('GOOGLE_DRIVE_API_KEY'),

    driveFile: getEnv('DRIVE_FILE', 'drive.txt'),
    tempDir: getEnv('TEMP_DIR', 'temp_videos'),
    uploadTimeoutMs: parseInt(getEnv('UPLOAD_TIMEOUT_MS', '600000'), 10),
};

export default env;
