import { AccessDeniedError } from '../../utils/errors';
import { SourceType } from '../../utils/types';

export enum Role {
    FULL_ACCESS = 'full-access',
    PDF_ONLY = 'pdf-only',
    WEB_ONLY = 'web-only',
}

// The only place that decides which source types a role may retrieve from.
const POLICY: Readonly<Record<Role, ReadonlySet<SourceType>>> = Object.freeze({
    [Role.FULL_ACCESS]: new Set([SourceType.PDF, SourceType.WEB]),
    [Role.PDF_ONLY]: new Set([SourceType.PDF]),
    [Role.WEB_ONLY]: new Set([SourceType.WEB]),
});

const ROLE_VALUES: ReadonlySet<string> = new Set(Object.values(Role));

export function isRole(value: unknown): value is Role {
    return typeof value === 'string' && ROLE_VALUES.has(value);
}

/** Boundary check for role strings coming from outside. */
export function parseRole(value: unknown): Role {
    if (isRole(value)) {
        return value;
    }
    throw new AccessDeniedError(typeof value === 'string' ? value : String(value ?? '<none>'));
}

export function allowedSourceTypes(role: Role): ReadonlySet<SourceType> {
    if (!isRole(role)) {
        throw new AccessDeniedError(String(role));
    }
    return new Set(POLICY[role]);
}
