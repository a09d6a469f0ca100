import * as bcrypt from 'bcrypt';
import { CredentialsService } from './credentials.service';

describe('CredentialsService', () => {
  const baseConfig = {
    username: 'admin',
    passwordHash: undefined,
    password: 'test-password',
    csrfSecret: 'test-secret',
  };

  it('should accept the configured username and password', async () => {
    const service = new CredentialsService(baseConfig);

    await expect(service.verify('admin', 'test-password')).resolves.toEqual({ username: 'admin' });
  });

  it('should reject a wrong password', async () => {
    const service = new CredentialsService(baseConfig);

    await expect(service.verify('admin', 'wrong-password')).resolves.toBeNull();
  });

  it('should reject an unknown username even with the right password', async () => {
    const service = new CredentialsService(baseConfig);

    await expect(service.verify('someone', 'test-password')).resolves.toBeNull();
  });

  it('should prefer a configured hash over the plain password', async () => {
    const passwordHash = bcrypt.hashSync('hashed-password', 4);
    const service = new CredentialsService({ ...baseConfig, passwordHash });

    await expect(service.verify('admin', 'hashed-password')).resolves.toEqual({ username: 'admin' });
    await expect(service.verify('admin', 'test-password')).resolves.toBeNull();
  });
});
