import { search } from 'duck-duck-scrape';
import { ProviderError, RateLimitedError } from '../../utils/errors';
import { DuckDuckGoService } from './duck-duck-go.service';

jest.mock('duck-duck-scrape', () => ({
    SafeSearchType: { STRICT: 0, MODERATE: -1, OFF: -2 },
    search: jest.fn(),
}));

describe('DuckDuckGoService', () => {
    const searchMock = jest.mocked(search);
    const service = new DuckDuckGoService();

    beforeEach(() => {
        searchMock.mockReset();
    });

    it('maps an anomaly response to a rate-limit error', async () => {
        searchMock.mockRejectedValue(new Error('DDG detected an anomaly in the request, you are likely making requests too quickly.'));

        await expect(service.search('paris', 3)).rejects.toBeInstanceOf(RateLimitedError);
    });

    it('maps other failures to a provider error', async () => {
        searchMock.mockRejectedValue(new Error('socket hang up'));

        const failure = service.search('paris', 3);
        await expect(failure).rejects.toBeInstanceOf(ProviderError);
        await expect(failure).rejects.not.toBeInstanceOf(RateLimitedError);
    });
});
