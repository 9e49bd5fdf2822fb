// Shapes shared by the registry, the token service and the HTTP/CLI hosts

export interface RegistryStats {
  size: number;
  empty: boolean;
  entropyBytes: number;
  maxTokens: number;
}

export interface IssuedToken {
  token: string;
  size: number; // live tokens after issuing
}

export interface VerificationResult {
  valid: boolean;
  size: number; // live tokens after the check
}

export type EvictionListener = (token: string) => void;
