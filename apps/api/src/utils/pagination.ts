export const getTotalPages = (totalItems: number, perPage: number) =>
  Math.ceil(totalItems / perPage);

export const getOffset = (page: number, perPage: number) =>
  perPage * (page - 1);

export const buildPageLink = (
  basePath: string,
  page: number,
  perPage: number,
) => `${basePath}/movies/?page=${page}&per_page=${perPage}`;

export type PageLinks = {
  prev_page: string | null;
  next_page: string | null;
};

/** Links to the neighbouring pages, `null` past either end. */
export function getPageLinks(
  basePath: string,
  page: number,
  perPage: number,
  totalPages: number,
): PageLinks {
  return {
    prev_page: page > 1 ? buildPageLink(basePath, page - 1, perPage) : null,
    next_page:
      page < totalPages ? buildPageLink(basePath, page + 1, perPage) : null,
  };
}
