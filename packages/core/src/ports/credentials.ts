export interface CredentialValidatorPort {
  validate(credential: string | undefined): Promise<boolean>;
}
