import { hostname, userInfo } from 'os';
import type { IdentitySource } from '../Domain/index.js';
import type { IdentityConfig } from '../Types/Config.js';

/** Label prefixed to the host name in the default audit source. */
export const RENUMBERING_SOURCE_PREFIX = `Tag Renumbering Wizard`;

/**
 * Identity taken from the running process: the OS account and the host name.
 * Configured values win over detected ones.
 */
export class SystemIdentitySource implements IdentitySource {
    constructor(private readonly _overrides: IdentityConfig = {}) {}

    PerformedBy(): string {
        return this._overrides.performedBy ?? userInfo().username;
    }

    Source(): string {
        return this._overrides.source ?? `${RENUMBERING_SOURCE_PREFIX}: ${hostname()}`;
    }
}

/** Fixed identity, for tests and service accounts. */
export class StaticIdentitySource implements IdentitySource {
    constructor(
        private readonly _performedBy: string,
        private readonly _source: string,
    ) {}

    PerformedBy(): string {
        return this._performedBy;
    }

    Source(): string {
        return this._source;
    }
}
