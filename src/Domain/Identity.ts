/** Supplies the actor and origin strings stamped on audit entries. Treated as opaque. */
export interface IdentitySource {
    PerformedBy(): string;
    Source(): string;
}
