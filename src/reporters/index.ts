/**
 * reporters/index.ts
 *
 * Importing a reporter registers it. Run order comes from each
 * reporter's `order`, not from this list.
 */

import './gtk_settings';
import './gtk_styles';
import './gnome_settings';
import './x_display';
import './x_resources';
import './xsettings';
import './fontconfig';
