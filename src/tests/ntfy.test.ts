import { NtfyService } from '../services/ntfy';
import { isAppError } from '../utils/errorHandler';
import { stubAdapter } from './httpStub';

describe('NtfyService', () => {
  it('posts a plain-text body with an ASCII title header', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 200, data: {} }));
    const ntfy = new NtfyService({ server: 'https://ntfy.test/', topic: 'price-alerts', adapter });

    await ntfy.send('Buy Price Alert 🚀', 'Buy price $0.00134000 is ≤ target $0.00135000', 'high');

    const sent = requests[0];
    expect(sent?.method).toBe('post');
    expect(sent?.baseURL).toBe('https://ntfy.test');
    expect(sent?.url).toBe('/price-alerts');
    expect(sent?.data).toBe('Buy price $0.00134000 is ≤ target $0.00135000');
    expect(sent?.headers.get('Title')).toBe('Buy Price Alert');
    expect(sent?.headers.get('Priority')).toBe('4');
  });

  it('surfaces delivery failures as collaborator errors', async () => {
    const { adapter } = stubAdapter(() => ({ status: 503, data: {} }));
    const ntfy = new NtfyService({ server: 'https://ntfy.test', topic: 'price-alerts', adapter });

    const failure = await ntfy.send('Title', 'body', 'normal').catch((error: unknown) => error);

    expect(isAppError(failure, 'COLLABORATOR_UNAVAILABLE')).toBe(true);
  });
});
