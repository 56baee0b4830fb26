import { compareIds } from "@/lib/snapshot";
import { outcomeFor } from "@/lib/stats";
import type { Match, NemesisRecord, PartnerRecord, RelationshipStat } from "@/lib/types";

export interface RelationshipOptions {
  /** Joint games required before a teammate can be best partner. */
  minPartnerGames?: number;
  /** Losses against an opponent required before they can be nemesis. */
  minNemesisLosses?: number;
}

export function analyzeRelationships(
  matches: readonly Match[],
  playerId: string,
  options: RelationshipOptions = {}
): RelationshipStat {
  const partners = new Map<string, PartnerRecord>();
  const opponents = new Map<string, NemesisRecord>();

  for (const match of matches) {
    const outcome = outcomeFor(match, playerId);
    if (!outcome) {
      continue;
    }

    const ownTeam = outcome === "win" ? match.winner_ids : match.loser_ids;
    const otherTeam = outcome === "win" ? match.loser_ids : match.winner_ids;
    const partnerId = ownTeam[0] === playerId ? ownTeam[1] : ownTeam[0];

    const partner = partners.get(partnerId) ?? { partnerId, wins: 0, losses: 0 };
    if (outcome === "win") {
      partner.wins += 1;
    } else {
      partner.losses += 1;
    }
    partners.set(partnerId, partner);

    for (const opponentId of otherTeam) {
      const opponent = opponents.get(opponentId) ?? { opponentId, lossesAgainst: 0, winsAgainst: 0 };
      if (outcome === "win") {
        opponent.winsAgainst += 1;
      } else {
        opponent.lossesAgainst += 1;
      }
      opponents.set(opponentId, opponent);
    }
  }

  return {
    bestPartner: pickBestPartner([...partners.values()], options.minPartnerGames ?? 1),
    nemesis: pickNemesis([...opponents.values()], options.minNemesisLosses ?? 1)
  };
}

function pickBestPartner(candidates: PartnerRecord[], minGames: number) {
  const eligible = candidates.filter((record) => record.wins + record.losses >= Math.max(1, minGames));
  if (eligible.length === 0) {
    return null;
  }

  eligible.sort((a, b) => {
    if (a.wins !== b.wins) return b.wins - a.wins;
    const totalA = a.wins + a.losses;
    const totalB = b.wins + b.losses;
    if (totalA !== totalB) return totalB - totalA;
    return compareIds(a.partnerId, b.partnerId);
  });

  return { ...eligible[0] };
}

function pickNemesis(candidates: NemesisRecord[], minLosses: number) {
  const eligible = candidates.filter((record) => record.lossesAgainst >= Math.max(1, minLosses));
  if (eligible.length === 0) {
    return null;
  }

  eligible.sort((a, b) => {
    if (a.lossesAgainst !== b.lossesAgainst) return b.lossesAgainst - a.lossesAgainst;
    const marginA = a.lossesAgainst - a.winsAgainst;
    const marginB = b.lossesAgainst - b.winsAgainst;
    if (marginA !== marginB) return marginB - marginA;
    return compareIds(a.opponentId, b.opponentId);
  });

  return { ...eligible[0] };
}
