import { BaseSiteAdapter } from './base-adapter';
import type { ListingSelectors } from '../crawl/types';

/**
 * Hosted career sites that render one `li.job-listing` per posting:
 *
 *   <li class="job-listing">
 *     <a href="/jobs/123-backend-engineer">Backend Engineer</a>
 *     <div class="job-subtitle">Engineering | Remote | Full-time</div>
 *     <span class="job-location">Berlin</span>
 *     <div class="job-posted">2024-05-02</div>
 *   </li>
 *
 * Job pages carry the long-form text in `#js-job-description`.
 */
export class CareerSiteAdapter extends BaseSiteAdapter {
  readonly resource = 'careersite';
  readonly selectors: ListingSelectors = {
    listing: { tag: 'li', className: 'job-listing' },
    location: { tag: 'span', className: 'job-location' },
    postDate: { tag: 'div', className: 'job-posted' },
    subtitle: { tag: 'div', className: 'job-subtitle' },
  };
}
