import type { Ora } from "ora";
export class Logger {
    private spinner: Ora | null = null;
    private verbose = false;

    setSpinner(spinner: Ora) {
        this.spinner = spinner;
    }

    clearSpinner() {
        this.spinner = null;
    }

    setVerbose(verbose: boolean) {
        this.verbose = verbose;
    }

    success(message: string) {
        this.print(() => console.log(`✓ ${message}`));
    }

    error(message: string) {
        this.print(() => console.error(`✗ ${message}`));
    }

    warn(message: string) {
        this.print(() => console.warn(`⚠ ${message}`));
    }

    info(message: string) {
        this.print(() => console.info(`ℹ ${message}`));
    }

    debug(message: string) {
        if (!this.verbose) return;
        this.print(() => console.debug(`· ${message}`));
    }

    // Keeps the spinner's frame from being torn by interleaved output
    private print(write: () => void) {
        const spinner = this.spinner?.isSpinning ? this.spinner : null;
        spinner?.clear();
        write();
        spinner?.render();
    }
}

export const logger = new Logger();
