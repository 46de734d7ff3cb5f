/**
 * Tenant (organisation)
 *
 * Created once by the first user to sign in under it; never renamed or deleted.
 */
export interface Tenant {
  id: string;
  key: string | null; // tenant-resolution key (email domain, fixed key), unique when set
  createdAt: Date;
}
