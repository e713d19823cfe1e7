export interface User {
  id: number;
  login: string;
  admin: boolean;
  createdAt: Date;
}

export interface InviteCode {
  code: string;
  ownerUserId: number;
  allowedUsageCount: number;
  remainingCount: number;
  createdAt: Date;
}
