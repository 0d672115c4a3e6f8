export type AccessTokenPayload = {
  sub: string;
  email?: string;
  role: string;
};

export type AuthContext = {
  userId: string;
  email: string | null;
};
