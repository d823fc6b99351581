import { DateWidget } from './DateWidget.js';
import type { DateWidgetOptions } from './DateWidget.js';

/** Date-and-time widget, UTC. Default format `YYYY-MM-DD HH:mm:ss`. */
export class DateTimeWidget extends DateWidget {
  protected override readonly invalidMessage: string = 'Enter a valid date/time';

  constructor(options?: DateWidgetOptions) {
    super(options, 'YYYY-MM-DD HH:mm:ss');
  }
}
