export interface AuthenticatedUser {
  id: string;
}
