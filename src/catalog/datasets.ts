import fs from "fs";
import path from "path";
import { Status, StatusWith } from "../status.js";

export type MenuItem = {
    label: string;
    value: string;
}

// Regular files of the 'directory', sorted by name
export function list_datasets(directory: string): StatusWith<MenuItem[]> {
    try {
        const items = fs.readdirSync(directory, { withFileTypes: true })
            .filter(entry => entry.isFile())
            .map(entry => entry.name)
            .sort()
            .map(name => ({ label: name, value: name }));
        return Status.ok().with(items);
    } catch (error) {
        return Status.exception(error).wrap(`can't list ${directory}`).with<MenuItem[]>(undefined);
    }
}

// Dataset keys are plain file names: nothing that could leave the directory
export function is_safe_dataset_key(key: string): boolean {
    if (!key) {
        return false;
    }
    return !key.includes("..") && !key.includes("/") && !key.includes("\\");
}

export function resolve_dataset(directory: string, key: string): StatusWith<string> {
    if (!is_safe_dataset_key(key)) {
        return StatusWith.fail_with(`'${key}' is not a valid dataset name`);
    }
    return Status.ok().with(path.join(directory, key));
}
