import Ajv from 'ajv';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export interface CreateReviewBody {
  name?: string | null;
  text?: string | null;
  captcha_id?: string | null;
  captcha_answer?: string | number | null;
}

export interface DeleteReviewBody {
  delete_token?: string | null;
}

const createReviewSchema = {
  type: 'object',
  properties: {
    name: { type: ['string', 'null'] },
    text: { type: ['string', 'null'] },
    captcha_id: { type: ['string', 'null'] },
    captcha_answer: { type: ['string', 'number', 'null'] },
  },
};

const deleteReviewSchema = {
  type: 'object',
  properties: {
    delete_token: { type: ['string', 'null'] },
  },
};

export const validateCreateReviewBody = ajv.compile<CreateReviewBody>(createReviewSchema);
export const validateDeleteReviewBody = ajv.compile<DeleteReviewBody>(deleteReviewSchema);
