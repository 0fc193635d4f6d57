import { instalarTestHardening } from '../../../test-utils/vitestStrict';

process.env.JWT_SECRETO = 'test-secret';

instalarTestHardening();
