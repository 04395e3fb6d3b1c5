export function rootPage(token: string | null): string {
  const input =
    token === null ? '' : `<input name="__RequestVerificationToken" type="hidden" value="${token}" />`;
  return `<html><body><form action="/Home/SearchResults" method="post">${input}</form></body></html>`;
}

export function memberLink(id: string): string {
  return `<div class="row"><div><a class="red" href="/Home/MemberDetails?memIndex=${id}">Member ${id}</a></div></div>`;
}

/**
 * A page of search results. `finalPage` adds a pagination control with a
 * skip-to-last entry.
 */
export function resultsPage(ids: readonly string[], finalPage?: number): string {
  const pagination =
    finalPage === undefined
      ? ''
      : `<ul class="pagination">
          <li class="page-item active"><a class="page-link" href="/Home/SearchResults?page=1">1</a></li>
          <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=2">2</a></li>
          <li class="page-item PagedList-skipToLast"><a class="page-link" href="/Home/SearchResults?page=${finalPage}">&gt;&gt;</a></li>
        </ul>`;
  return `<html><body><div class="container">${ids.map(memberLink).join('\n')}</div>${pagination}</body></html>`;
}

export interface TermFixture {
  congress: string;
  position: string;
  state: string;
  party: string;
}

export interface MemberFixture {
  id: string;
  firstnames: string;
  lastname: string;
  birthYear?: string;
  deathYear?: string;
  biography?: string;
  terms: TermFixture[];
}

export function memberXml(member: MemberFixture): string {
  const terms = member.terms
    .map(
      (term) => `
    <term>
      <congress-number>${term.congress}</congress-number>
      <term-position>${term.position}</term-position>
      <term-state>${term.state}</term-state>
      <term-party>${term.party}</term-party>
    </term>`
    )
    .join('');
  const biography =
    member.biography === undefined ? '' : `\n  <biography>${member.biography}</biography>`;

  return `<?xml version="1.0" encoding="UTF-8"?>
<bioguide id="${member.id}">
  <personal-info>
    <name>
      <firstnames>${member.firstnames}</firstnames>
      <lastname>${member.lastname}</lastname>
    </name>
    <birth-year>${member.birthYear ?? ''}</birth-year>
    <death-year>${member.deathYear ?? ''}</death-year>${terms}
  </personal-info>${biography}
</bioguide>`;
}

export function simpleMember(id: string, congress: number): MemberFixture {
  return {
    id,
    firstnames: `First ${id}`,
    lastname: 'TESTER',
    terms: [{ congress: String(congress), position: 'Representative', state: 'va', party: 'Democrat' }],
  };
}
