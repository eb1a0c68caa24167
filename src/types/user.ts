// Identity subsystem as seen by the avatar pool

export interface ProfileUser {
  id: string;
  username: string;
  profileImagePath: string | null;
}

/**
 * The identity subsystem owns users and their profile image pointer. The
 * avatar pool reads users, changes `profileImagePath` on the object it got
 * and hands it back through `persistUser`.
 */
export interface UserDirectory {
  getUser(id: string): Promise<ProfileUser | null>;
  listUsers(): Promise<ProfileUser[]>;
  persistUser(user: ProfileUser): Promise<boolean>;
}
