import { spawn } from 'child_process';
import { logger } from '../../utils/logger';
import { MuxTool } from '../core/types';

/**
 * FfmpegRunner - runs the ffmpeg executable for thumbnail conversion and
 * container metadata/cover-art rewrites
 */
export class FfmpegRunner implements MuxTool {
    readonly name = 'ffmpeg';

    private readonly binaryPath: string;
    private readonly timeout: number;

    constructor(binaryPath: string = 'ffmpeg', timeout: number = 300000) {
        this.binaryPath = binaryPath;
        this.timeout = timeout;
    }

    /**
     * Probe `ffmpeg -version`; any failure means the tool is unusable
     */
    async isAvailable(): Promise<boolean> {
        try {
            await this.execute(['-version']);
            return true;
        } catch (error) {
            logger.warn('ffmpeg is not available', {
                path: this.binaryPath,
                error: (error as Error).message,
            });
            return false;
        }
    }

    async run(args: string[]): Promise<void> {
        logger.debug('Executing ffmpeg', { args: args.join(' ') });
        await this.execute(['-hide_banner', '-loglevel', 'error', ...args]);
    }

    private execute(args: string[]): Promise<void> {
        return new Promise((resolve, reject) => {
            let errorOutput = '';

            const proc = spawn(this.binaryPath, args, {
                stdio: ['ignore', 'ignore', 'pipe'],
            });

            proc.stderr?.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            const timer = setTimeout(() => {
                proc.kill('SIGKILL');
                reject(new Error(`ffmpeg timed out after ${this.timeout}ms`));
            }, this.timeout);

            proc.on('close', (code: number | null) => {
                clearTimeout(timer);
                if (code === 0) {
                    resolve();
                } else {
                    reject(new Error(errorOutput.trim() || `ffmpeg exited with code ${code}`));
                }
            });

            proc.on('error', (error: Error) => {
                clearTimeout(timer);
                reject(error);
            });
        });
    }
}
