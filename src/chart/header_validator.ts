import { Status } from "../status.js";

export const HEADER_LINES = 5;

// Header lines are expected without line terminators and trimmed
export function check_header(lines: string[], comment_marker: string): Status {
    if (lines.length < HEADER_LINES) {
        return Status.fail(`header MUST have ${HEADER_LINES} lines, got ${lines.length}`);
    }

    for (let i = 0; i < HEADER_LINES; i++) {
        const line = lines[i];
        if (line.length == 0) {
            return Status.fail(`header line ${i + 1} is empty`);
        }
        if (!line.startsWith(comment_marker)) {
            return Status.fail(`header line ${i + 1} doesn't start with '${comment_marker}'`);
        }
        if (line.length <= comment_marker.length) {
            return Status.fail(`header line ${i + 1} has no directive`);
        }
    }
    return Status.ok();
}
