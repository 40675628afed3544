/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

/**
 * Section title followed by a rule of `width` dashes.
 */
export function heading(title: string, width: number = title.length): void {
    console.log(title);
    console.log('-'.repeat(width));
}

export function rule(width: number): void {
    console.log('-'.repeat(width));
}
