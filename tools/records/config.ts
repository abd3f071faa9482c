// tools/records/config.ts
import path from 'node:path';
import { DEFAULT_PROFILE_BASE } from './normalize';

export interface BuildConfig {
    inputDir: string;
    usersFile: string;
    achievementsFile: string;
    output: string;
    profileBase: string;
}

export function getConfig(argv = process.argv.slice(2)): BuildConfig {
    // CLI flags: --input <dir> --output <file> --profile-base <url> (also --key=value)
    const args = new Map<string, string>();
    for (let i = 0; i < argv.length; i++) {
        const a = argv[i];
        if (!a.startsWith('--')) continue;
        const eq = a.indexOf('=');
        if (eq !== -1) {
            args.set(a.slice(2, eq), a.slice(eq + 1));
        } else {
            const next = argv[i + 1];
            const hasValue = next !== undefined && !next.startsWith('--');
            args.set(a.slice(2), hasValue ? next : 'true');
            if (hasValue) i++;
        }
    }

    const inputDir = args.get('input') ?? 'conf';
    const profileBase = args.get('profile-base') ?? DEFAULT_PROFILE_BASE;
    if (!/^https?:\/\//.test(profileBase)) {
        throw new Error(`--profile-base must be an http(s) URL, got '${profileBase}'`);
    }

    return {
        inputDir,
        usersFile: path.join(inputDir, 'Users.csv'),
        achievementsFile: path.join(inputDir, 'UserAchievements.csv'),
        output: args.get('output') ?? path.join(inputDir, 'records.parquet'),
        profileBase,
    };
}
