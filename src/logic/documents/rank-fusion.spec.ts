import { RRF_K, fuseRankings } from './rank-fusion';

describe('fuseRankings', () => {
    const hit = (id: string) => ({ id, item: id.toUpperCase() });

    it('ranks ids found by both lists above ids found by one', () => {
        const fused = fuseRankings([[hit('a'), hit('b')], [hit('c'), hit('b')]], 3);

        expect(fused.map(entry => entry.id)).toEqual(['b', 'a', 'c']);
        expect(fused[0].rrf).toBeCloseTo(2 / (RRF_K + 2));
        expect(fused[1].rrf).toBeCloseTo(1 / (RRF_K + 1));
    });

    it('keeps first-seen order on ties and truncates to size', () => {
        const fused = fuseRankings([[hit('a')], [hit('c')]], 1);

        expect(fused).toEqual([{ id: 'a', item: 'A', rrf: 1 / (RRF_K + 1) }]);
    });
});
